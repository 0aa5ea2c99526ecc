import { describe, it, expect, beforeEach } from '@jest/globals';
import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../app';
import { DataSourceRecord } from '../../repositories/types';
import { TEST_API_KEY, TestContext, createTestContext, seedApiKey } from '../../__tests__/support/testContext';

const auth = { Authorization: `Api-Key ${TEST_API_KEY}` };

describe('ETL job routes', () => {
  let t: TestContext;
  let app: Express;
  let source: DataSourceRecord;

  beforeEach(async () => {
    t = createTestContext();
    app = createApp(t.ctx);
    await seedApiKey(t);
    source = await t.repositories.dataSources.create({ name: 'S1', sourceType: 'stream', connectionString: 'test://source' });
  });

  describe('POST /etl-jobs', () => {
    it('creates a pending job and dispatches it', async () => {
      const res = await request(app)
        .post('/api/v1/etl-jobs')
        .set(auth)
        .send({ name: 'J1', data_source: source.id, configuration: { duration_seconds: 3, records_per_second: 50 } });

      expect(res.status).toBe(201);
      expect(res.body.success).toBe(true);
      expect(res.body.data).toMatchObject({
        name: 'J1',
        status: 'pending',
        data_source_id: source.id,
        started_at: null,
        completed_at: null,
        records_processed: 0,
        error_message: '',
        duration: null,
        configuration: { duration_seconds: 3, records_per_second: 50 },
      });
      expect(res.body.data.data_source).toMatchObject({ id: source.id, name: 'S1', etl_jobs_count: 1 });
      expect(t.queues.etl.messages.map((queued) => queued.message)).toEqual([{ jobId: res.body.data.id, attempt: 0 }]);
    });

    it('ignores lifecycle fields in the body', async () => {
      const res = await request(app)
        .post('/api/v1/etl-jobs')
        .set(auth)
        .send({ name: 'J1', data_source: source.id, status: 'completed', records_processed: 99 });

      expect(res.status).toBe(201);
      expect(res.body.data).toMatchObject({ status: 'pending', records_processed: 0 });
    });

    it('rejects jobs for inactive sources', async () => {
      await t.repositories.dataSources.update(source.id, { isActive: false });

      const res = await request(app).post('/api/v1/etl-jobs').set(auth).send({ name: 'J1', data_source: source.id });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('Cannot create job for inactive data source.');
      expect(res.body.details).toEqual({
        errors: [{ field: 'data_source', message: 'Cannot create job for inactive data source.' }],
      });
      expect(t.queues.etl.messages).toHaveLength(0);
    });

    it('reports every missing field', async () => {
      const res = await request(app).post('/api/v1/etl-jobs').set(auth).send({});

      expect(res.status).toBe(400);
      expect(res.body.details.errors).toEqual([
        { field: 'name', message: 'name is required' },
        { field: 'data_source', message: 'data_source is required' },
      ]);
    });
  });

  describe('POST /etl-jobs/:id/retry', () => {
    it('re-queues a failed job', async () => {
      const job = t.repositories.jobs.insert({
        name: 'J1',
        dataSourceId: source.id,
        status: 'failed',
        errorMessage: 'boom',
        startedAt: new Date('2024-03-15T10:00:00.000Z'),
        completedAt: new Date('2024-03-15T10:01:00.000Z'),
      });

      const res = await request(app).post(`/api/v1/etl-jobs/${job.id}/retry`).set(auth);

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ id: job.id, status: 'pending', error_message: '', started_at: null });
      expect(t.queues.etl.messages).toHaveLength(1);
    });

    it('refuses jobs that are not failed or cancelled', async () => {
      const job = t.repositories.jobs.insert({ name: 'J1', dataSourceId: source.id, status: 'running' });

      const res = await request(app).post(`/api/v1/etl-jobs/${job.id}/retry`).set(auth);

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('Only failed or cancelled jobs can be retried');
    });

    it('answers unknown ids with 404', async () => {
      const res = await request(app).post('/api/v1/etl-jobs/does-not-exist/retry').set(auth);

      expect(res.status).toBe(404);
      expect(res.body.error).toBe('ETL job not found');
    });
  });

  describe('GET /etl-jobs', () => {
    beforeEach(() => {
      t.repositories.jobs.insert({
        name: 'first',
        dataSourceId: source.id,
        status: 'completed',
        createdAt: new Date('2024-03-15T09:00:00.000Z'),
        startedAt: new Date('2024-03-15T09:00:00.000Z'),
        completedAt: new Date('2024-03-15T09:00:45.000Z'),
        recordsProcessed: 150,
      });
      t.repositories.jobs.insert({
        name: 'second',
        dataSourceId: source.id,
        status: 'failed',
        createdAt: new Date('2024-03-15T10:00:00.000Z'),
        errorMessage: 'temporary outage',
      });
      t.repositories.jobs.insert({
        name: 'third',
        dataSourceId: source.id,
        status: 'pending',
        createdAt: new Date('2024-03-15T11:00:00.000Z'),
      });
    });

    it('lists newest first with derived durations', async () => {
      const res = await request(app).get('/api/v1/etl-jobs').set(auth);

      expect(res.status).toBe(200);
      expect(res.body.data.map((job: { name: string }) => job.name)).toEqual(['third', 'second', 'first']);
      expect(res.body.data[2].duration).toBe(45);
      expect(res.body.meta).toEqual({ page: 1, limit: 10, total: 3, totalPages: 1 });
    });

    it('accepts comma-separated statuses', async () => {
      const res = await request(app).get('/api/v1/etl-jobs?status=failed,completed&ordering=name').set(auth);

      expect(res.body.data.map((job: { name: string }) => job.name)).toEqual(['first', 'second']);
    });

    it('rejects unknown statuses', async () => {
      const res = await request(app).get('/api/v1/etl-jobs?status=bogus').set(auth);

      expect(res.status).toBe(400);
      expect(res.body.details.errors[0].field).toBe('status');
    });

    it('filters on error presence and record counts', async () => {
      const withErrors = await request(app).get('/api/v1/etl-jobs?has_errors=true').set(auth);
      const large = await request(app).get('/api/v1/etl-jobs?min_records=100').set(auth);

      expect(withErrors.body.data.map((job: { name: string }) => job.name)).toEqual(['second']);
      expect(large.body.data.map((job: { name: string }) => job.name)).toEqual(['first']);
    });

    it('paginates', async () => {
      const res = await request(app).get('/api/v1/etl-jobs?page=2&limit=2').set(auth);

      expect(res.body.data.map((job: { name: string }) => job.name)).toEqual(['first']);
      expect(res.body.meta).toEqual({ page: 2, limit: 2, total: 3, totalPages: 2 });
    });
  });
});

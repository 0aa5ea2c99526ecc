import { describe, it, expect, beforeEach } from '@jest/globals';
import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../app';
import { TEST_API_KEY, TestContext, createTestContext, seedApiKey } from '../../__tests__/support/testContext';

const auth = { Authorization: `Api-Key ${TEST_API_KEY}` };

describe('data source routes', () => {
  let t: TestContext;
  let app: Express;

  beforeEach(async () => {
    t = createTestContext();
    app = createApp(t.ctx);
    await seedApiKey(t);
  });

  it('creates a source without echoing its connection string', async () => {
    const res = await request(app)
      .post('/api/v1/data-sources')
      .set(auth)
      .send({ name: 'Orders DB', source_type: 'database', connection_string: 'postgres://localhost/orders' });

    expect(res.status).toBe(201);
    expect(res.body.data).toEqual({
      id: expect.any(String),
      name: 'Orders DB',
      source_type: 'database',
      is_active: true,
      metadata: {},
      etl_jobs_count: 0,
      created_at: '2024-03-15T12:00:00.000Z',
      updated_at: '2024-03-15T12:00:00.000Z',
    });
  });

  it('rejects a name already taken in another case', async () => {
    await t.repositories.dataSources.create({ name: 'Orders DB', sourceType: 'database', connectionString: 'test://source' });

    const res = await request(app)
      .post('/api/v1/data-sources')
      .set(auth)
      .send({ name: 'ORDERS DB', source_type: 'api', connection_string: 'test://source' });

    expect(res.status).toBe(400);
    expect(res.body.details.errors).toEqual([{ field: 'name', message: 'A data source with this name already exists.' }]);
  });

  it('rejects unknown source types', async () => {
    const res = await request(app)
      .post('/api/v1/data-sources')
      .set(auth)
      .send({ name: 'Queue', source_type: 'ftp', connection_string: 'test://source' });

    expect(res.status).toBe(400);
    expect(res.body.details.errors[0].field).toBe('source_type');
  });

  it('rejects a blank connection string', async () => {
    const res = await request(app)
      .post('/api/v1/data-sources')
      .set(auth)
      .send({ name: 'Blank', source_type: 'api', connection_string: '' });

    expect(res.status).toBe(400);
    expect(res.body.details.errors).toEqual([
      { field: 'connection_string', message: 'connection_string may not be blank' },
    ]);
    expect(t.repositories.dataSources.records.size).toBe(0);
  });

  it('patches only the given fields', async () => {
    const source = await t.repositories.dataSources.create({
      name: 'Orders DB',
      sourceType: 'database',
      connectionString: 'postgres://localhost/orders',
    });

    const res = await request(app).patch(`/api/v1/data-sources/${source.id}`).set(auth).send({ is_active: false });

    expect(res.status).toBe(200);
    expect(res.body.data).toMatchObject({ name: 'Orders DB', source_type: 'database', is_active: false });
    expect((await t.repositories.dataSources.findById(source.id))?.connectionString).toBe('postgres://localhost/orders');
  });

  it('filters by type, state and name fragment', async () => {
    await t.repositories.dataSources.create({ name: 'Orders DB', sourceType: 'database', connectionString: 'test://source' });
    await t.repositories.dataSources.create({ name: 'Orders API', sourceType: 'api', connectionString: 'test://source' });
    await t.repositories.dataSources.create({
      name: 'Old orders',
      sourceType: 'api',
      connectionString: 'test://source',
      isActive: false,
    });

    const res = await request(app).get('/api/v1/data-sources?source_type=api&is_active=true&search=orders').set(auth);

    expect(res.body.data.map((source: { name: string }) => source.name)).toEqual(['Orders API']);
  });

  it('deletes a source with its jobs', async () => {
    const source = await t.repositories.dataSources.create({ name: 'Orders DB', sourceType: 'database', connectionString: 'test://source' });
    t.repositories.jobs.insert({ name: 'nightly', dataSourceId: source.id });

    const res = await request(app).delete(`/api/v1/data-sources/${source.id}`).set(auth);

    expect(res.status).toBe(204);
    expect(t.repositories.jobs.records.size).toBe(0);
    const missing = await request(app).get(`/api/v1/data-sources/${source.id}`).set(auth);
    expect(missing.status).toBe(404);
  });

  it('serves dashboard statistics', async () => {
    await t.repositories.dataSources.create({ name: 'Orders DB', sourceType: 'database', connectionString: 'test://source' });

    const res = await request(app).get('/api/v1/dashboard/stats').set(auth);

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({
      total_data_sources: 1,
      active_data_sources: 1,
      total_etl_jobs: 0,
      running_jobs: 0,
      completed_jobs_today: 0,
      failed_jobs_today: 0,
      recent_jobs: [],
    });
  });
});

import { describe, it, expect, beforeEach } from '@jest/globals';
import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../app';
import { TEST_API_KEY, TestContext, createTestContext, seedApiKey } from './support/testContext';

describe('API application', () => {
  let t: TestContext;
  let app: Express;

  beforeEach(async () => {
    t = createTestContext();
    app = createApp(t.ctx);
    await seedApiKey(t);
  });

  it('serves the health report without authentication or envelope', async () => {
    const res = await request(app).get('/api/v1/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: 'healthy',
      timestamp: '2024-03-15T12:00:00.000Z',
      version: '1.0.0',
      database: true,
      cache: true,
      celery: false,
      uptime: expect.any(Number),
    });
  });

  it('rejects requests without a key', async () => {
    const res = await request(app).get('/api/v1/data-sources');

    expect(res.status).toBe(401);
    expect(res.body.success).toBe(false);
    expect(res.body.error).toBe('Authentication credentials were not provided.');
  });

  it('rejects unknown keys', async () => {
    const res = await request(app).get('/api/v1/data-sources').set('Authorization', 'Api-Key not-a-key');

    expect(res.status).toBe(401);
    expect(res.body.error).toBe('Invalid API key.');
  });

  it('accepts the key in either header', async () => {
    const viaAuthorization = await request(app).get('/api/v1/metrics').set('Authorization', `api-key ${TEST_API_KEY}`);
    const viaHeader = await request(app).get('/api/v1/metrics').set('X-API-Key', TEST_API_KEY);

    expect(viaAuthorization.status).toBe(200);
    expect(viaHeader.status).toBe(200);
  });

  it('answers unknown API routes with 404', async () => {
    const res = await request(app).get('/api/v1/nope');

    expect(res.status).toBe(404);
    expect(res.body.error).toBe('Not Found - /api/v1/nope');
  });

  describe('metrics', () => {
    const auth = { Authorization: `Api-Key ${TEST_API_KEY}` };

    it('records a metric and filters by label', async () => {
      const created = await request(app)
        .post('/api/v1/metrics')
        .set(auth)
        .send({ metric_name: 'rows_loaded', metric_value: 42, metric_type: 'counter', labels: { table: 'orders' } });

      expect(created.status).toBe(201);
      expect(created.body.data).toMatchObject({
        metric_name: 'rows_loaded',
        metric_value: 42,
        metric_type: 'counter',
        labels: { table: 'orders' },
        timestamp: '2024-03-15T12:00:00.000Z',
      });

      const matching = await request(app).get('/api/v1/metrics?label_key=table&label_value=ord').set(auth);
      const other = await request(app).get('/api/v1/metrics?label_key=schema').set(auth);

      expect(matching.body.data).toHaveLength(1);
      expect(matching.body.meta).toEqual({ page: 1, limit: 10, total: 1, totalPages: 1 });
      expect(other.body.data).toHaveLength(0);
    });

    it('rejects unknown metric types', async () => {
      const res = await request(app)
        .post('/api/v1/metrics')
        .set(auth)
        .send({ metric_name: 'rows_loaded', metric_value: 1, metric_type: 'bogus' });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('Metric type must be one of: counter, gauge, histogram, summary');
    });
  });

  describe('api keys', () => {
    const auth = { Authorization: `Api-Key ${TEST_API_KEY}` };

    it('lists only the caller keys and issues new ones', async () => {
      const created = await request(app).post('/api/v1/keys').set(auth).send({ name: 'Deploy key' });
      expect(created.status).toBe(201);
      expect(created.body.data.user.username).toBe('tester');
      expect(created.body.data.key).not.toBe(TEST_API_KEY);

      const listed = await request(app).get('/api/v1/keys?ordering=name').set(auth);
      expect(listed.body.data.map((key: { name: string }) => key.name)).toEqual(['Deploy key', 'Test key']);
    });

    it('hides keys of other users', async () => {
      const bob = await t.repositories.users.create({ username: 'bob', email: 'bob@example.com' });
      const bobs = await t.ctx.apiKeys.create(bob.id, { name: 'Bob key' });

      const res = await request(app).delete(`/api/v1/keys/${bobs.id}`).set(auth);
      expect(res.status).toBe(404);
      expect(res.body.error).toBe('API key not found');
    });
  });
});

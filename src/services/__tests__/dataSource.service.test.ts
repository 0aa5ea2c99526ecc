import { describe, it, expect, beforeEach } from '@jest/globals';
import { TestContext, createTestContext } from '../../__tests__/support/testContext';
import { NotFoundError, ValidationError } from '../../utils/errors';

describe('DataSourceService', () => {
  let t: TestContext;

  beforeEach(() => {
    t = createTestContext();
  });

  it('creates a source with a zero job count', async () => {
    const source = await t.ctx.dataSources.create({
      name: 'Orders DB',
      sourceType: 'database',
      connectionString: 'postgres://localhost/orders',
    });

    expect(source).toMatchObject({ name: 'Orders DB', isActive: true, etlJobsCount: 0, metadata: {} });
  });

  it('rejects names that differ only by case', async () => {
    await t.ctx.dataSources.create({ name: 'Orders DB', sourceType: 'database', connectionString: 'test://source' });

    const duplicate = t.ctx.dataSources.create({ name: 'orders db', sourceType: 'api', connectionString: 'test://source' });
    await expect(duplicate).rejects.toBeInstanceOf(ValidationError);
    await expect(duplicate).rejects.toThrow('A data source with this name already exists.');
  });

  it('lets a source keep its own name on update', async () => {
    const source = await t.ctx.dataSources.create({ name: 'Orders DB', sourceType: 'database', connectionString: 'test://source' });

    const updated = await t.ctx.dataSources.update(source.id, { name: 'ORDERS DB', isActive: false });
    expect(updated).toMatchObject({ name: 'ORDERS DB', isActive: false });
  });

  it('rejects renaming onto another source', async () => {
    await t.ctx.dataSources.create({ name: 'Orders DB', sourceType: 'database', connectionString: 'test://source' });
    const other = await t.ctx.dataSources.create({ name: 'Clicks', sourceType: 'stream', connectionString: 'test://source' });

    await expect(t.ctx.dataSources.update(other.id, { name: 'orders db' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('counts the jobs of each source', async () => {
    const orders = await t.ctx.dataSources.create({ name: 'Orders DB', sourceType: 'database', connectionString: 'test://source' });
    const clicks = await t.ctx.dataSources.create({ name: 'Clicks', sourceType: 'stream', connectionString: 'test://source' });
    t.repositories.jobs.insert({ name: 'a', dataSourceId: orders.id });
    t.repositories.jobs.insert({ name: 'b', dataSourceId: orders.id });

    const page = await t.ctx.dataSources.list({}, { page: 1, limit: 10, skip: 0, sort: { name: 1 } });
    expect(page.items.map((source) => [source.name, source.etlJobsCount])).toEqual([
      ['Clicks', 0],
      ['Orders DB', 2],
    ]);
    await expect(t.ctx.dataSources.get(clicks.id)).resolves.toMatchObject({ etlJobsCount: 0 });
  });

  it('deletes a source together with its jobs', async () => {
    const orders = await t.ctx.dataSources.create({ name: 'Orders DB', sourceType: 'database', connectionString: 'test://source' });
    const job = t.repositories.jobs.insert({ name: 'a', dataSourceId: orders.id });

    await t.ctx.dataSources.delete(orders.id);

    await expect(t.repositories.jobs.findById(job.id)).resolves.toBeNull();
    await expect(t.ctx.dataSources.get(orders.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('reports unknown ids as not found', async () => {
    await expect(t.ctx.dataSources.update('missing', { isActive: false })).rejects.toThrow('Data source not found');
    await expect(t.ctx.dataSources.delete('missing')).rejects.toBeInstanceOf(NotFoundError);
  });
});

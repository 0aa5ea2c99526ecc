import {
  DataSourceFilter,
  DataSourceRecord,
  DataSourceRepository,
  DataSourceUpdate,
  EtlJobRepository,
  NewDataSource,
} from '../repositories/types';
import { NotFoundError, ValidationError } from '../utils/errors';
import { Page, PaginationOptions } from '../utils/pagination';
import { createLogger } from '../utils/logger';

const log = createLogger('data-sources');

export interface DataSourceView extends DataSourceRecord {
  etlJobsCount: number;
}

export class DataSourceService {
  constructor(
    private readonly dataSources: DataSourceRepository,
    private readonly jobs: EtlJobRepository
  ) {}

  /**
   * Reject a name that matches another source case-insensitively. `exceptId` lets a
   * record keep its own name.
   */
  private async assertNameAvailable(name: string, exceptId?: string): Promise<void> {
    const existing = await this.dataSources.findByName(name);
    if (existing && existing.id !== exceptId) {
      throw new ValidationError('name', 'A data source with this name already exists.');
    }
  }

  async withJobCounts(sources: DataSourceRecord[]): Promise<DataSourceView[]> {
    if (sources.length === 0) {
      return [];
    }
    const counts = await this.jobs.countByDataSource(sources.map((source) => source.id));
    return sources.map((source) => ({ ...source, etlJobsCount: counts.get(source.id) ?? 0 }));
  }

  async list(filter: DataSourceFilter, options: PaginationOptions): Promise<Page<DataSourceView>> {
    const page = await this.dataSources.list(filter, options);
    return { ...page, items: await this.withJobCounts(page.items) };
  }

  async get(id: string): Promise<DataSourceView> {
    const source = await this.dataSources.findById(id);
    if (!source) {
      throw new NotFoundError('Data source not found');
    }
    const [view] = await this.withJobCounts([source]);
    return view;
  }

  async create(input: NewDataSource): Promise<DataSourceView> {
    await this.assertNameAvailable(input.name);
    const source = await this.dataSources.create(input);
    log.info(`Created data source ${source.id}: ${source.name}`, { sourceType: source.sourceType });
    return { ...source, etlJobsCount: 0 };
  }

  async update(id: string, patch: DataSourceUpdate): Promise<DataSourceView> {
    if (patch.name !== undefined) {
      await this.assertNameAvailable(patch.name, id);
    }
    const source = await this.dataSources.update(id, patch);
    if (!source) {
      throw new NotFoundError('Data source not found');
    }
    const [view] = await this.withJobCounts([source]);
    return view;
  }

  /**
   * Delete a source together with the jobs it owns
   */
  async delete(id: string): Promise<void> {
    const source = await this.dataSources.findById(id);
    if (!source) {
      throw new NotFoundError('Data source not found');
    }
    const removedJobs = await this.jobs.deleteByDataSource(id);
    await this.dataSources.delete(id);
    log.info(`Deleted data source ${id} and ${removedJobs} jobs`);
  }
}

import { intersection, keyBy } from 'lodash';
import {
  DataSourceRepository,
  EtlJobFilter,
  EtlJobRecord,
  EtlJobRepository,
} from '../../repositories/types';
import { Page, PaginationOptions } from '../../utils/pagination';
import { DataSourceService, DataSourceView } from '../dataSource.service';

export interface EtlJobView extends EtlJobRecord {
  dataSource: DataSourceView | null;
}

/** Job list filter as accepted from callers, before data source names are resolved. */
export interface EtlJobQuery extends Omit<EtlJobFilter, 'dataSourceIds'> {
  dataSourceId?: string;
  dataSourceName?: string;
}

/**
 * Read side of ETL jobs: filtering and assembling jobs with their data sources
 */
export class EtlJobService {
  constructor(
    private readonly jobs: EtlJobRepository,
    private readonly dataSources: DataSourceRepository,
    private readonly dataSourceService: DataSourceService
  ) {}

  /**
   * Turn `dataSourceId`/`dataSourceName` into the id set the repository filters on
   */
  async resolveFilter({ dataSourceId, dataSourceName, ...rest }: EtlJobQuery): Promise<EtlJobFilter> {
    let dataSourceIds: string[] | undefined;

    if (dataSourceId !== undefined) {
      dataSourceIds = [dataSourceId];
    }
    if (dataSourceName) {
      const matching = await this.dataSources.findIdsByNameContains(dataSourceName);
      dataSourceIds = dataSourceIds ? intersection(dataSourceIds, matching) : matching;
    }

    return dataSourceIds ? { ...rest, dataSourceIds } : rest;
  }

  async toViews(jobs: EtlJobRecord[]): Promise<EtlJobView[]> {
    if (jobs.length === 0) {
      return [];
    }
    const sourceIds = [...new Set(jobs.map((job) => job.dataSourceId))];
    const sources = await this.dataSources.findByIds(sourceIds);
    const views = keyBy(await this.dataSourceService.withJobCounts(sources), 'id');

    return jobs.map((job) => ({ ...job, dataSource: views[job.dataSourceId] ?? null }));
  }

  async toView(job: EtlJobRecord): Promise<EtlJobView> {
    const [view] = await this.toViews([job]);
    return view;
  }

  async list(query: EtlJobQuery, options: PaginationOptions): Promise<Page<EtlJobView>> {
    const page = await this.jobs.list(await this.resolveFilter(query), options);
    return { ...page, items: await this.toViews(page.items) };
  }

  async recent(limit: number): Promise<EtlJobView[]> {
    return this.toViews(await this.jobs.find({}, { createdAt: -1 }, limit));
  }
}

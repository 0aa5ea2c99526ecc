import { DataSourceRepository, EtlJobRepository } from '../repositories/types';
import { utcDayRange } from '../utils/dateUtils';
import { EtlJobService, EtlJobView } from './etl/etlJob.service';

export const RECENT_JOBS_LIMIT = 5;

export interface DashboardStats {
  totalDataSources: number;
  activeDataSources: number;
  totalEtlJobs: number;
  runningJobs: number;
  completedJobsToday: number;
  failedJobsToday: number;
  recentJobs: EtlJobView[];
}

export class DashboardService {
  constructor(
    private readonly dataSources: DataSourceRepository,
    private readonly jobs: EtlJobRepository,
    private readonly etlJobs: EtlJobService,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Counts by status; "today" is the current UTC day, matched on completion time
   */
  async getStats(): Promise<DashboardStats> {
    const { start, end } = utcDayRange(this.now());
    const today = { completedAfter: start, completedBefore: new Date(end.getTime() - 1) };

    const [totalDataSources, activeDataSources, totalEtlJobs, runningJobs, completedJobsToday, failedJobsToday, recentJobs] =
      await Promise.all([
        this.dataSources.count(),
        this.dataSources.count({ isActive: true }),
        this.jobs.count(),
        this.jobs.count({ statuses: ['running'] }),
        this.jobs.count({ statuses: ['completed'], ...today }),
        this.jobs.count({ statuses: ['failed'], ...today }),
        this.etlJobs.recent(RECENT_JOBS_LIMIT),
      ]);

    return {
      totalDataSources,
      activeDataSources,
      totalEtlJobs,
      runningJobs,
      completedJobsToday,
      failedJobsToday,
      recentJobs,
    };
  }
}

import { DashboardStats } from '../services/dashboard.service';
import { EtlJobResponse, serializeEtlJob } from './etlJob.serializer';

export interface DashboardStatsResponse {
  total_data_sources: number;
  active_data_sources: number;
  total_etl_jobs: number;
  running_jobs: number;
  completed_jobs_today: number;
  failed_jobs_today: number;
  recent_jobs: EtlJobResponse[];
}

export const serializeDashboardStats = (stats: DashboardStats): DashboardStatsResponse => ({
  total_data_sources: stats.totalDataSources,
  active_data_sources: stats.activeDataSources,
  total_etl_jobs: stats.totalEtlJobs,
  running_jobs: stats.runningJobs,
  completed_jobs_today: stats.completedJobsToday,
  failed_jobs_today: stats.failedJobsToday,
  recent_jobs: stats.recentJobs.map(serializeEtlJob),
});

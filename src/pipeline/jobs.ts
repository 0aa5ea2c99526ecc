import { aggregateMetrics, cleanData, extractRawData, loadMetrics } from './assets';
import { PipelineJob } from './types';

export const etlPipelineJob: PipelineJob = {
  name: 'etl_pipeline',
  description: 'Complete ETL pipeline for data processing',
  tags: { team: 'data', environment: 'production' },
  async run(context, stage) {
    const raw = await stage('raw_data_extract', 0, () => extractRawData(context.config), (rows) => rows.length);
    const cleaned = await stage(
      'cleaned_data',
      raw.length,
      () => cleanData(raw, context.now()),
      (rows) => rows.length
    );
    const aggregated = await stage(
      'aggregated_metrics',
      cleaned.length,
      () => aggregateMetrics(cleaned, context.now()),
      () => 1
    );
    await stage('data_load_complete', 1, () => loadMetrics(aggregated, context), (written) => written);
  },
};

export const extractOnlyJob: PipelineJob = {
  name: 'extract_only',
  description: 'Quick data extraction job',
  tags: { team: 'data', environment: 'development' },
  async run(context, stage) {
    await stage('raw_data_extract', 0, () => extractRawData(context.config), (rows) => rows.length);
  },
};

export const PIPELINE_JOBS: PipelineJob[] = [etlPipelineJob, extractOnlyJob];

export * from './User';
export * from './ApiKey';
export * from './DataSource';
export * from './EtlJob';
export * from './MetricData';
export * from './PipelineRun';

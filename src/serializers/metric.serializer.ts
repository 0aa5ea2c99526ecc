import { Labels, MetricRecord, MetricType } from '../repositories/types';

export interface MetricResponse {
  id: string;
  metric_name: string;
  metric_value: number;
  metric_type: MetricType;
  labels: Labels;
  timestamp: string;
  created_at: string;
}

export const serializeMetric = (metric: MetricRecord): MetricResponse => ({
  id: metric.id,
  metric_name: metric.metricName,
  metric_value: metric.metricValue,
  metric_type: metric.metricType,
  labels: metric.labels,
  timestamp: metric.timestamp.toISOString(),
  created_at: metric.createdAt.toISOString(),
});

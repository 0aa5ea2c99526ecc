import { Labels, METRIC_TYPES, MetricType } from '../repositories/types';
import { paginationKeys } from '../utils/pagination';
import { Joi, schemas } from '../utils/validation';

export interface CreateMetricBody {
  metric_name: string;
  metric_value: number;
  metric_type?: MetricType;
  labels?: Labels;
}

export interface MetricListQuery {
  page: number;
  limit: number;
  ordering?: string;
  metric_name?: string;
  metric_type?: MetricType;
  timestamp_after?: Date;
  timestamp_before?: Date;
  min_value?: number;
  max_value?: number;
  has_labels?: boolean;
  label_key?: string;
  label_value?: string;
}

const metricType = Joi.string()
  .valid(...METRIC_TYPES)
  .messages({ 'any.only': `Metric type must be one of: ${METRIC_TYPES.join(', ')}` });

export const createMetricSchema = Joi.object<CreateMetricBody>({
  metric_name: Joi.string().trim().max(100).required(),
  metric_value: Joi.number().required(),
  metric_type: metricType,
  labels: schemas.labels,
});

export const listMetricsSchema = Joi.object<MetricListQuery>({
  ...paginationKeys,
  metric_name: Joi.string().trim(),
  metric_type: metricType,
  timestamp_after: schemas.dateTime,
  timestamp_before: schemas.dateTime,
  min_value: Joi.number(),
  max_value: Joi.number(),
  has_labels: schemas.queryBoolean,
  label_key: Joi.string(),
  label_value: Joi.string(),
});

export const METRIC_ORDERING: Record<string, string> = {
  timestamp: 'timestamp',
  metric_name: 'metricName',
  metric_value: 'metricValue',
};

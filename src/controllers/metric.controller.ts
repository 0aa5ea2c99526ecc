import { Request, Response } from 'express';
import { AppContext } from '../container';
import { serializeMetric } from '../serializers/metric.serializer';
import { createdResponse, paginatedResponse } from '../utils/apiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { createLogger } from '../utils/logger';
import { getPaginationOptions } from '../utils/pagination';
import { parseInput } from '../utils/validation';
import { METRIC_ORDERING, createMetricSchema, listMetricsSchema } from '../validations/metric.validation';

const log = createLogger('metrics-api');

export const createMetricController = ({ metrics }: AppContext) => ({
  // @desc    List metrics
  // @route   GET /metrics
  // @access  Private
  list: asyncHandler(async (req: Request, res: Response) => {
    const query = parseInput(listMetricsSchema, req.query);
    const options = getPaginationOptions(query, METRIC_ORDERING, { timestamp: -1 });

    const page = await metrics.list(
      {
        nameContains: query.metric_name,
        metricType: query.metric_type,
        timestampAfter: query.timestamp_after,
        timestampBefore: query.timestamp_before,
        minValue: query.min_value,
        maxValue: query.max_value,
        hasLabels: query.has_labels,
        labelKey: query.label_key,
        labelValue: query.label_value,
      },
      options
    );
    return paginatedResponse(res, page.items.map(serializeMetric), page.total, page.page, page.limit);
  }),

  // @desc    Record a metric
  // @route   POST /metrics
  // @access  Private
  create: asyncHandler(async (req: Request, res: Response) => {
    const body = parseInput(createMetricSchema, req.body);
    log.debug('Recording metric', { metricName: body.metric_name });

    const metric = await metrics.record({
      name: body.metric_name,
      value: body.metric_value,
      type: body.metric_type,
      labels: body.labels,
    });
    return createdResponse(res, serializeMetric(metric), 'Metric recorded');
  }),
});

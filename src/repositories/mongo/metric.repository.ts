import { IMetricData, MetricData } from '../../models';
import { Page, PaginationOptions } from '../../utils/pagination';
import { MetricFilter, MetricRecord, MetricRepository, NewMetric } from '../types';
import { buildMetricQuery } from './queries';

const toRecord = (doc: IMetricData): MetricRecord => ({
  id: doc._id,
  metricName: doc.metricName,
  metricValue: doc.metricValue,
  metricType: doc.metricType,
  labels: doc.labels ?? {},
  timestamp: doc.timestamp,
  createdAt: doc.createdAt,
});

export class MongoMetricRepository implements MetricRepository {
  async create(input: NewMetric): Promise<MetricRecord> {
    const doc = await MetricData.create({
      metricName: input.metricName,
      metricValue: input.metricValue,
      metricType: input.metricType ?? 'gauge',
      labels: input.labels ?? {},
      timestamp: input.timestamp ?? new Date(),
    });
    return toRecord(doc);
  }

  async list(filter: MetricFilter, options: PaginationOptions): Promise<Page<MetricRecord>> {
    const query = buildMetricQuery(filter);
    const [docs, total] = await Promise.all([
      MetricData.find(query).sort(options.sort).skip(options.skip).limit(options.limit),
      MetricData.countDocuments(query),
    ]);
    return { items: docs.map(toRecord), total, page: options.page, limit: options.limit };
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    const result = await MetricData.deleteMany({ timestamp: { $lt: cutoff } });
    return result.deletedCount;
  }
}

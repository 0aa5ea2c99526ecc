import { FilterQuery } from 'mongoose';
import { escapeRegExp } from 'lodash';
import { IDataSource, IEtlJob, IMetricData } from '../../models';
import { DataSourceFilter, EtlJobFilter, MetricFilter } from '../types';

interface Range<T> {
  $gte?: T;
  $lte?: T;
}

/** Inclusive range condition, or undefined when neither bound is set. */
const range = <T>(min: T | undefined, max: T | undefined): Range<T> | undefined => {
  if (min === undefined && max === undefined) {
    return undefined;
  }
  const condition: Range<T> = {};
  if (min !== undefined) condition.$gte = min;
  if (max !== undefined) condition.$lte = max;
  return condition;
};

const contains = (fragment: string) => ({ $regex: escapeRegExp(fragment), $options: 'i' });

export const buildDataSourceQuery = (filter: DataSourceFilter): FilterQuery<IDataSource> => {
  const query: FilterQuery<IDataSource> = {};

  if (filter.sourceType) query.sourceType = filter.sourceType;
  if (filter.isActive !== undefined) query.isActive = filter.isActive;
  if (filter.search) query.name = contains(filter.search);
  if (filter.updatedSince) query.updatedAt = { $gte: filter.updatedSince };

  return query;
};

export const buildEtlJobQuery = (filter: EtlJobFilter): FilterQuery<IEtlJob> => {
  const query: FilterQuery<IEtlJob> = {};
  const and: FilterQuery<IEtlJob>[] = [];

  if (filter.statuses && filter.statuses.length > 0) {
    query.status = { $in: filter.statuses };
  }
  if (filter.dataSourceIds) {
    query.dataSource = { $in: filter.dataSourceIds };
  }

  // Exact name and name fragments may be combined
  if (filter.name !== undefined) and.push({ name: filter.name });
  if (filter.nameContains) and.push({ name: contains(filter.nameContains) });
  if (filter.search) and.push({ name: contains(filter.search) });

  const created = range(filter.createdAfter, filter.createdBefore);
  if (created) query.createdAt = created;
  const started = range(filter.startedAfter, filter.startedBefore);
  if (started) query.startedAt = started;
  const completed = range(filter.completedAfter, filter.completedBefore);
  if (completed) query.completedAt = completed;
  const records = range(filter.minRecords, filter.maxRecords);
  if (records) query.recordsProcessed = records;

  if (filter.hasErrors !== undefined) {
    and.push(filter.hasErrors ? { errorMessage: { $ne: '' } } : { errorMessage: '' });
  }
  if (filter.errorContains) and.push({ errorMessage: contains(filter.errorContains) });
  // Documents written before the counter existed have no field
  if (filter.recoveryAttemptsBelow !== undefined) {
    query.recoveryAttempts = { $not: { $gte: filter.recoveryAttemptsBelow } };
  }

  if (and.length > 0) query.$and = and;
  return query;
};

const labelEntries = { $objectToArray: { $ifNull: ['$labels', {}] } };

export const buildMetricQuery = (filter: MetricFilter): FilterQuery<IMetricData> => {
  const query: FilterQuery<IMetricData> = {};
  const expressions: Record<string, unknown>[] = [];

  if (filter.nameContains) query.metricName = contains(filter.nameContains);
  if (filter.metricType) query.metricType = filter.metricType;

  const timestamp = range(filter.timestampAfter, filter.timestampBefore);
  if (timestamp) query.timestamp = timestamp;
  const value = range(filter.minValue, filter.maxValue);
  if (value) query.metricValue = value;

  if (filter.hasLabels !== undefined) {
    expressions.push(
      filter.hasLabels ? { $gt: [{ $size: labelEntries }, 0] } : { $eq: [{ $size: labelEntries }, 0] }
    );
  }
  if (filter.labelKey) {
    expressions.push({ $in: [filter.labelKey, { $map: { input: labelEntries, as: 'l', in: '$$l.k' } }] });
  }
  // Substring match over every label value; not index-assisted
  if (filter.labelValue) {
    expressions.push({
      $anyElementTrue: [
        {
          $map: {
            input: labelEntries,
            as: 'l',
            in: { $regexMatch: { input: { $toString: '$$l.v' }, regex: escapeRegExp(filter.labelValue) } },
          },
        },
      ],
    });
  }

  if (expressions.length === 1) {
    query.$expr = expressions[0];
  } else if (expressions.length > 1) {
    query.$expr = { $and: expressions };
  }
  return query;
};

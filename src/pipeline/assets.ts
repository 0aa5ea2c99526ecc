import { countBy, max, meanBy, min, uniqBy } from 'lodash';
import { AssetContext, PipelineConfig } from './types';

export const VALUE_CATEGORIES = ['low', 'medium', 'high'] as const;
export type ValueCategory = (typeof VALUE_CATEGORIES)[number];

export interface RawRecord {
  id: number;
  name: string | null;
  value: number | null;
  status: string | null;
}

export interface CleanedRecord {
  id: number;
  name: string;
  value: number;
  status: string;
  processed_at: string;
  value_category: ValueCategory | null;
}

export interface AggregatedMetrics {
  total_records: number;
  avg_value: number;
  max_value: number;
  min_value: number;
  value_distribution: Record<ValueCategory, number>;
  status_distribution: Record<string, number>;
  processed_at: string;
}

/** A data-quality check on an asset failed; the stage does not produce output. */
export class AssetCheckError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AssetCheckError';
  }
}

/**
 * Right-closed bins: (0, 100] low, (100, 500] medium, above 500 high. Values at or
 * below zero fall outside every bin.
 */
export const categorizeValue = (value: number): ValueCategory | null => {
  if (value <= 0) return null;
  if (value <= 100) return 'low';
  if (value <= 500) return 'medium';
  return 'high';
};

/**
 * Synthetic extract: ids 1..batchSize with value id*10
 */
export const extractRawData = (config: PipelineConfig): RawRecord[] =>
  Array.from({ length: config.batchSize }, (_, index) => {
    const id = index + 1;
    return { id, name: `Record_${id}`, value: id * 10, status: 'active' };
  });

const isComplete = (
  record: RawRecord
): record is RawRecord & { name: string; value: number; status: string } =>
  record.name !== null && record.value !== null && !Number.isNaN(record.value) && record.status !== null;

export const cleanData = (raw: RawRecord[], processedAt: Date): CleanedRecord[] => {
  const cleaned = raw.filter(isComplete).map((record) => ({
    id: record.id,
    name: record.name,
    value: record.value,
    status: record.status,
    processed_at: processedAt.toISOString(),
    value_category: categorizeValue(record.value),
  }));

  if (cleaned.length === 0) {
    throw new AssetCheckError('No records after cleaning');
  }
  if (uniqBy(cleaned, 'id').length !== cleaned.length) {
    throw new AssetCheckError('Duplicate IDs found');
  }

  return cleaned;
};

export const aggregateMetrics = (cleaned: CleanedRecord[], processedAt: Date): AggregatedMetrics => {
  const values = cleaned.map((record) => record.value);
  const categories = countBy(cleaned, 'value_category');

  return {
    total_records: cleaned.length,
    avg_value: cleaned.length > 0 ? meanBy(cleaned, 'value') : 0,
    max_value: max(values) ?? 0,
    min_value: min(values) ?? 0,
    value_distribution: {
      low: categories.low ?? 0,
      medium: categories.medium ?? 0,
      high: categories.high ?? 0,
    },
    status_distribution: countBy(cleaned, 'status'),
    processed_at: processedAt.toISOString(),
  };
};

/**
 * Record every numeric aggregate as an `etl_<key>` gauge. Returns the number of
 * gauges written; a failed write propagates.
 */
export const loadMetrics = async (aggregated: AggregatedMetrics, context: AssetContext): Promise<number> => {
  const labels = { pipeline: context.jobName, table: context.config.targetTable };
  let written = 0;

  for (const [key, value] of Object.entries(aggregated)) {
    if (typeof value === 'number') {
      await context.metrics.gauge(`etl_${key}`, value, labels);
      written += 1;
    }
  }

  context.log.info('Data load completed successfully', {
    totalRecords: aggregated.total_records,
    targetTable: context.config.targetTable,
  });
  return written;
};

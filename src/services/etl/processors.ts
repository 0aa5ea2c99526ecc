import { ConfigurationError, UnsupportedSourceTypeError } from '../../utils/errors';
import { sleep } from '../../utils/asyncHandler';
import { KeyValueMap, SourceType } from '../../repositories/types';

/** Upper bound on the simulated wait of a stream source, in seconds. */
export const MAX_STREAM_WAIT_SECONDS = 5;

export interface ProcessingPlan {
  records: number;
  waitSeconds: number;
}

/**
 * Simulated work for one source type. `plan` reads the job configuration at the
 * point of use and never touches the clock.
 */
export interface SourceProcessor {
  readonly sourceType: SourceType;
  plan(configuration: KeyValueMap): ProcessingPlan;
}

export type Wait = (ms: number) => Promise<void>;

export interface JobProcessorOptions {
  wait?: Wait;
  /** Multiplier applied to every simulated wait */
  simulationScale?: number;
}

/**
 * Read a non-negative numeric configuration value. Absent keys take the default;
 * numeric strings are accepted.
 */
export const readCount = (configuration: KeyValueMap, key: string, fallback: number): number => {
  const raw = configuration[key];
  if (raw === undefined || raw === null) {
    return fallback;
  }

  const value = typeof raw === 'number' ? raw : typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : NaN;
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`Configuration "${key}" must be a non-negative number, got ${JSON.stringify(raw)}`);
  }
  return value;
};

const databaseProcessor: SourceProcessor = {
  sourceType: 'database',
  plan: (configuration) => ({
    records: readCount(configuration, 'batch_size', 1000),
    waitSeconds: 2,
  }),
};

const apiProcessor: SourceProcessor = {
  sourceType: 'api',
  plan: (configuration) => ({
    records: readCount(configuration, 'page_size', 100) * readCount(configuration, 'pages', 5),
    waitSeconds: 1.5,
  }),
};

const fileProcessor: SourceProcessor = {
  sourceType: 'file',
  plan: (configuration) => ({
    records: readCount(configuration, 'estimated_records', 5000),
    waitSeconds: 3,
  }),
};

const streamProcessor: SourceProcessor = {
  sourceType: 'stream',
  plan: (configuration) => {
    const duration = readCount(configuration, 'duration_seconds', 10);
    return {
      records: duration * readCount(configuration, 'records_per_second', 100),
      waitSeconds: Math.min(duration, MAX_STREAM_WAIT_SECONDS),
    };
  },
};

export const DEFAULT_PROCESSORS: SourceProcessor[] = [databaseProcessor, apiProcessor, fileProcessor, streamProcessor];

/**
 * Runs the simulated extraction for a job and returns the number of records processed
 */
export class JobProcessor {
  private processors: Map<string, SourceProcessor> = new Map();
  private readonly wait: Wait;
  private readonly simulationScale: number;

  constructor(options: JobProcessorOptions = {}, processors: SourceProcessor[] = DEFAULT_PROCESSORS) {
    this.wait = options.wait ?? sleep;
    this.simulationScale = options.simulationScale ?? 1;
    processors.forEach((processor) => this.processors.set(processor.sourceType, processor));
  }

  /**
   * Resolve the plan for a source type without waiting
   */
  plan(sourceType: string, configuration: KeyValueMap): ProcessingPlan {
    const processor = this.processors.get(sourceType);
    if (!processor) {
      throw new UnsupportedSourceTypeError(sourceType);
    }
    const plan = processor.plan(configuration);
    const records = Math.floor(plan.records);
    if (!Number.isSafeInteger(records)) {
      throw new ConfigurationError(`Record count for ${sourceType} source is out of range: ${plan.records}`);
    }
    return { records, waitSeconds: plan.waitSeconds };
  }

  async process(sourceType: string, configuration: KeyValueMap): Promise<number> {
    const { records, waitSeconds } = this.plan(sourceType, configuration);
    await this.wait(waitSeconds * 1000 * this.simulationScale);
    return records;
  }
}

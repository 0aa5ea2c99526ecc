import { DependencyUnavailableError } from '../utils/errors';
import { withTimeout } from '../utils/asyncHandler';
import { createLogger } from '../utils/logger';

const log = createLogger('health');

export interface HealthProbes {
  database: () => Promise<void>;
  cache: () => Promise<void>;
  /** Resolves true when at least one worker is consuming */
  worker: () => Promise<boolean>;
}

export interface HealthOptions {
  timeoutMs: number;
  version: string;
  uptime?: () => number;
  now?: () => Date;
}

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  version: string;
  database: boolean;
  cache: boolean;
  celery: boolean;
  uptime: number;
}

/**
 * Composite probe. Each dependency is bounded by the same timeout and a failure only
 * clears its own flag; database and cache failures make the service unhealthy.
 */
export class HealthService {
  constructor(
    private readonly probes: HealthProbes,
    private readonly options: HealthOptions
  ) {}

  private async probe<T>(name: string, check: () => Promise<T>): Promise<T | null> {
    const { timeoutMs } = this.options;
    try {
      return await withTimeout(
        check(),
        timeoutMs,
        () => new DependencyUnavailableError(name, `no response within ${timeoutMs}ms`)
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.error(`${name} health check failed`, { error: reason });
      return null;
    }
  }

  async check(): Promise<HealthReport> {
    const [database, cache, worker] = await Promise.all([
      this.probe('database', this.probes.database),
      this.probe('cache', this.probes.cache),
      this.probe('worker', this.probes.worker),
    ]);

    const databaseOk = database !== null;
    const cacheOk = cache !== null;
    const uptime = this.options.uptime ?? (() => process.uptime());

    return {
      status: databaseOk && cacheOk ? 'healthy' : 'unhealthy',
      timestamp: (this.options.now?.() ?? new Date()).toISOString(),
      version: this.options.version,
      database: databaseOk,
      cache: cacheOk,
      celery: worker === true,
      uptime: Math.floor(uptime()),
    };
  }
}

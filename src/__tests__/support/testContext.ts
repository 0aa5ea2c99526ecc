import { AppContext, createContext } from '../../container';
import { EtlJobMessage } from '../../services/etl/dispatcher';
import { LifecycleOptions } from '../../services/etl/lifecycle.service';
import { JobProcessor } from '../../services/etl/processors';
import { HealthProbes } from '../../services/health.service';
import { MaintenanceMessage } from '../../workers/maintenance.worker';
import { PipelineMessage } from '../../workers/pipeline.worker';
import { InMemoryWorkQueue } from './inMemoryQueue';
import { InMemoryRepositories, createInMemoryRepositories } from './inMemoryRepositories';

export const TEST_API_KEY = 'test-secret';

/** Mutable test clock */
export class TestClock {
  constructor(private current: Date) {}

  now = (): Date => new Date(this.current.getTime());

  set(at: Date): void {
    this.current = at;
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export interface TestQueues {
  etl: InMemoryWorkQueue<EtlJobMessage>;
  maintenance: InMemoryWorkQueue<MaintenanceMessage>;
  pipeline: InMemoryWorkQueue<PipelineMessage>;
}

export interface TestContext {
  ctx: AppContext;
  repositories: InMemoryRepositories;
  queues: TestQueues;
  clock: TestClock;
}

export interface TestContextOptions {
  now?: Date;
  processor?: JobProcessor;
  lifecycle?: Partial<LifecycleOptions>;
  probes?: Partial<HealthProbes>;
}

/**
 * Context over in-memory repositories and queues. Simulated work never waits.
 */
export const createTestContext = (options: TestContextOptions = {}): TestContext => {
  const clock = new TestClock(options.now ?? new Date('2024-03-15T12:00:00.000Z'));
  const repositories = createInMemoryRepositories(clock.now);
  const queues: TestQueues = {
    etl: new InMemoryWorkQueue<EtlJobMessage>('etl-jobs', clock.now),
    maintenance: new InMemoryWorkQueue<MaintenanceMessage>('maintenance', clock.now),
    pipeline: new InMemoryWorkQueue<PipelineMessage>('asset-pipeline', clock.now),
  };

  const probes: HealthProbes = {
    database: async () => undefined,
    cache: async () => undefined,
    worker: () => queues.etl.isResponsive(),
    ...options.probes,
  };

  const ctx = createContext(repositories, queues, probes, {
    now: clock.now,
    processor: options.processor ?? new JobProcessor({ wait: async () => undefined }),
    lifecycle: options.lifecycle,
  });

  return { ctx, repositories, queues, clock };
};

/**
 * Create a user holding the fixed test key
 */
export const seedApiKey = async ({ repositories }: TestContext, username = 'tester') => {
  const user = await repositories.users.create({ username, email: `${username}@example.com` });
  const apiKey = await repositories.apiKeys.create({ name: 'Test key', key: TEST_API_KEY, userId: user.id });
  return { user, apiKey };
};

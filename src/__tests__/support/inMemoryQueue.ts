import { Delivery, EnqueueOptions, MessageHandler, WorkQueue } from '../../utils/queue';

export interface QueuedMessage<T> {
  id: string;
  message: T;
  options: EnqueueOptions;
  enqueuedAt: Date;
}

/**
 * WorkQueue that records every enqueue and delivers only when a test asks it to
 */
export class InMemoryWorkQueue<T> implements WorkQueue<T> {
  readonly name: string;
  readonly messages: QueuedMessage<T>[] = [];
  private handler?: MessageHandler<T>;
  private sequence = 0;

  constructor(
    name = 'test-queue',
    private readonly now: () => Date = () => new Date()
  ) {
    this.name = name;
  }

  async enqueue(message: T, options: EnqueueOptions = {}): Promise<string> {
    this.sequence += 1;
    const id = options.jobId ?? String(this.sequence);
    if (options.jobId && this.messages.some((queued) => queued.id === options.jobId)) {
      return id;
    }
    this.messages.push({ id, message, options, enqueuedAt: this.now() });
    return id;
  }

  process(handler: MessageHandler<T>): void {
    this.handler = handler;
  }

  async isResponsive(): Promise<boolean> {
    return this.handler !== undefined;
  }

  async clearRepeatable(): Promise<void> {
    const oneOff = this.messages.filter((queued) => !queued.options.repeat);
    this.messages.splice(0, this.messages.length, ...oneOff);
  }

  async close(): Promise<void> {
    this.handler = undefined;
  }

  /** Remove and return the oldest one-off message. */
  take(): QueuedMessage<T> | undefined {
    const index = this.messages.findIndex((queued) => !queued.options.repeat);
    return index === -1 ? undefined : this.messages.splice(index, 1)[0];
  }

  /** Hand the oldest one-off message to the attached consumer. */
  async deliverNext(): Promise<boolean> {
    const queued = this.take();
    if (!queued) {
      return false;
    }
    if (!this.handler) {
      throw new Error(`No consumer attached to ${this.name}`);
    }
    const delivery: Delivery = {
      id: queued.id,
      enqueuedAt: queued.enqueuedAt,
      dueAt: new Date(queued.enqueuedAt.getTime() + (queued.options.delayMs ?? 0)),
    };
    await this.handler(queued.message, delivery);
    return true;
  }
}

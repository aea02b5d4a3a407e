import type { ContentSink } from "./uploadSession";

type Waiter = () => void;

/**
 * Ordered queue of at most `queueDepth` chunks drained by a single consumer.
 * A full queue blocks the writer until the consumer takes a chunk.
 */
export class BoundedQueueWriteBuffer {
  readonly kind = "boundedQueue";
  private queue: Buffer[] = [];
  private ended = false;
  private consumer: Promise<void> | null = null;
  private failure: unknown = null;
  private spaceWaiters: Waiter[] = [];
  private dataWaiters: Waiter[] = [];

  constructor(
    private readonly sink: ContentSink,
    readonly queueDepth: number
  ) {}

  async write(data: Buffer): Promise<void> {
    this.throwIfFailed();
    this.startConsumer();
    while (this.queue.length >= this.queueDepth) {
      await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
      this.throwIfFailed();
    }
    this.queue.push(Buffer.from(data));
    wake(this.dataWaiters);
  }

  async close(): Promise<void> {
    this.ended = true;
    wake(this.dataWaiters);
    if (this.consumer) await this.consumer;
    this.throwIfFailed();
  }

  private startConsumer(): void {
    if (this.consumer) return;
    this.consumer = this.drain().then(undefined, (err: unknown) => {
      this.failure = err;
      this.queue = [];
      wake(this.spaceWaiters);
    });
  }

  private async drain(): Promise<void> {
    for (;;) {
      const chunk = this.queue.shift();
      if (!chunk) {
        if (this.ended) return;
        await new Promise<void>((resolve) => this.dataWaiters.push(resolve));
        continue;
      }
      wake(this.spaceWaiters);
      await this.sink.push(chunk);
    }
  }

  private throwIfFailed(): void {
    if (this.failure !== null) throw this.failure;
  }
}

function wake(waiters: Waiter[]): void {
  for (const resolve of waiters.splice(0)) resolve();
}

import type { ContentSink } from "./uploadSession";

/**
 * Double buffering: a full buffer is pushed in the background while the
 * writer fills a fresh one. At most one push is in flight; order is kept.
 */
export class AsyncWriteBuffer {
  readonly kind = "async";
  private buffer: Buffer;
  private fill = 0;
  private inFlight: Promise<void> | null = null;
  private failure: unknown = null;

  constructor(
    private readonly sink: ContentSink,
    readonly bufferSize: number
  ) {
    this.buffer = Buffer.alloc(bufferSize);
  }

  async write(data: Buffer): Promise<void> {
    this.throwIfFailed();
    let offset = 0;
    while (offset < data.length) {
      const copied = data.copy(this.buffer, this.fill, offset);
      this.fill += copied;
      offset += copied;
      if (this.fill === this.bufferSize) {
        const full = this.buffer;
        this.buffer = Buffer.alloc(this.bufferSize);
        this.fill = 0;
        await this.waitForInFlight();
        this.startPush(full);
      }
    }
  }

  async close(): Promise<void> {
    await this.waitForInFlight();
    if (this.fill > 0) {
      const last = this.buffer.subarray(0, this.fill);
      this.fill = 0;
      await this.sink.push(last);
    }
  }

  private startPush(chunk: Buffer): void {
    const push = this.sink.push(chunk).then(
      () => {
        if (this.inFlight === push) this.inFlight = null;
      },
      (err: unknown) => {
        this.failure = err;
        if (this.inFlight === push) this.inFlight = null;
      }
    );
    this.inFlight = push;
  }

  private async waitForInFlight(): Promise<void> {
    if (this.inFlight) await this.inFlight;
    this.throwIfFailed();
  }

  private throwIfFailed(): void {
    if (this.failure !== null) throw this.failure;
  }
}

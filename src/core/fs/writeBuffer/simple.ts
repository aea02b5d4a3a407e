import type { ContentSink } from "./uploadSession";

/**
 * One fixed-size buffer. The writer waits while a full buffer is pushed.
 */
export class SimpleWriteBuffer {
  readonly kind = "simple";
  private buffer: Buffer;
  private fill = 0;

  constructor(
    private readonly sink: ContentSink,
    readonly bufferSize: number
  ) {
    this.buffer = Buffer.alloc(bufferSize);
  }

  async write(data: Buffer): Promise<void> {
    let offset = 0;
    while (offset < data.length) {
      const copied = data.copy(this.buffer, this.fill, offset);
      this.fill += copied;
      offset += copied;
      if (this.fill === this.bufferSize) {
        await this.flush();
      }
    }
  }

  async close(): Promise<void> {
    await this.flush();
  }

  private async flush(): Promise<void> {
    if (this.fill === 0) return;
    const chunk = Buffer.from(this.buffer.subarray(0, this.fill));
    this.fill = 0;
    await this.sink.push(chunk);
  }
}

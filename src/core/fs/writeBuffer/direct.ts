import type { ContentSink } from "./uploadSession";

/**
 * No buffering: every write goes straight to the sink.
 */
export class DirectWriteBuffer {
  readonly kind = "none";

  constructor(private readonly sink: ContentSink) {}

  async write(data: Buffer): Promise<void> {
    await this.sink.push(Buffer.from(data));
  }

  async close(): Promise<void> {
    // nothing held back
  }
}

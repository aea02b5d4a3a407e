/**
 * One streamed content upload per write handle.
 *
 * The backend only replaces content wholesale, so every chunk a handle pushes
 * goes into a single PassThrough that the store consumes as one upload. The
 * upload starts with the first chunk; finish() ends the stream and waits.
 */

import { once } from "events";
import { PassThrough } from "stream";
import { DriveFsError, wrapRemote } from "../../errors";
import type { DriveNode, RemoteNodeStore } from "../../drive/types";

/** Where a write buffer delivers its chunks, in order. */
export interface ContentSink {
  push(chunk: Buffer): Promise<void>;
}

export class UploadSession implements ContentSink {
  private stream: PassThrough | null = null;
  private settled: Promise<void> | null = null;
  private result: DriveNode | null = null;
  private failure: DriveFsError | null = null;
  private bytes = 0;

  constructor(
    private readonly store: RemoteNodeStore,
    private readonly nodeId: string,
    private readonly path: string
  ) {}

  get bytesWritten(): number {
    return this.bytes;
  }

  get started(): boolean {
    return this.stream !== null;
  }

  async push(chunk: Buffer): Promise<void> {
    this.throwIfFailed();
    if (chunk.length === 0) return;

    const { stream, settled } = this.start();
    this.bytes += chunk.length;
    if (!stream.write(chunk)) {
      await Promise.race([once(stream, "drain"), settled]);
    }
    this.throwIfFailed();
  }

  /**
   * End the upload and wait for the store. Returns the updated node, or null
   * when nothing was ever pushed and `force` is not set.
   */
  async finish(force = false): Promise<DriveNode | null> {
    if (!this.stream && !force) return null;
    const { stream, settled } = this.start();
    stream.end();
    await settled;
    this.throwIfFailed();
    return this.result;
  }

  private start(): { stream: PassThrough; settled: Promise<void> } {
    if (this.stream && this.settled) {
      return { stream: this.stream, settled: this.settled };
    }
    const stream = new PassThrough();
    const settled = this.store.writeContent(this.nodeId, stream).then(
      (node) => {
        this.result = node;
      },
      (err: unknown) => {
        this.failure = wrapRemote("write", this.path, err);
        // unblock anything still feeding the stream
        stream.resume();
      }
    );
    this.stream = stream;
    this.settled = settled;
    return { stream, settled };
  }

  private throwIfFailed(): void {
    if (this.failure) throw this.failure;
  }
}

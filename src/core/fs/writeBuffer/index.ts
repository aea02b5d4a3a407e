/**
 * Write buffer strategies. Selected per handle at open time.
 */

import type { WriteBufferStrategyName } from "../../eventBus";
import { AsyncWriteBuffer } from "./async";
import { BoundedQueueWriteBuffer } from "./boundedQueue";
import { DirectWriteBuffer } from "./direct";
import { SimpleWriteBuffer } from "./simple";
import type { ContentSink } from "./uploadSession";

export interface WriteBufferOptions {
  strategy: WriteBufferStrategyName;
  bufferSize: number;
  queueDepth: number;
}

export const DEFAULT_BUFFER_SIZE = 16 * 1024;
export const DEFAULT_QUEUE_DEPTH = 8;

export type WriteBuffer =
  | DirectWriteBuffer
  | SimpleWriteBuffer
  | AsyncWriteBuffer
  | BoundedQueueWriteBuffer;

export function createWriteBuffer(options: WriteBufferOptions, sink: ContentSink): WriteBuffer {
  switch (options.strategy) {
    case "none":
      return new DirectWriteBuffer(sink);
    case "simple":
      return new SimpleWriteBuffer(sink, options.bufferSize);
    case "async":
      return new AsyncWriteBuffer(sink, options.bufferSize);
    case "boundedQueue":
      return new BoundedQueueWriteBuffer(sink, options.queueDepth);
    default: {
      const unknownStrategy: never = options.strategy;
      throw new Error(`Unknown write buffer strategy: ${String(unknownStrategy)}`);
    }
  }
}

export { AsyncWriteBuffer, BoundedQueueWriteBuffer, DirectWriteBuffer, SimpleWriteBuffer };
export { UploadSession } from "./uploadSession";
export type { ContentSink } from "./uploadSession";

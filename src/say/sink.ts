import { writeSync } from "node:fs";

import { errnoCode } from "../utils/fs.js";

/**
 * Destination for rendered bytes. `write` is synchronous and reports a
 * failure by throwing.
 */
export interface ByteSink {
  write(chunk: Uint8Array): void;
}

export interface BufferSink extends ByteSink {
  contents(): Buffer;
  text(): string;
}

export function createBufferSink(): BufferSink {
  const chunks: Buffer[] = [];

  return {
    write(chunk) {
      chunks.push(Buffer.from(chunk));
    },
    contents() {
      return Buffer.concat(chunks);
    },
    text() {
      return Buffer.concat(chunks).toString("utf8");
    },
  };
}

export type WriteSyncFn = (
  fd: number,
  buffer: Uint8Array,
  offset: number,
  length: number,
) => number;

export interface FileDescriptorSinkOptions {
  writeSync?: WriteSyncFn;
  /** Pause between attempts while the descriptor reports EAGAIN. */
  retryDelayMs?: number;
  /** EAGAIN attempts in a row before the error is passed on. */
  maxRetries?: number;
}

const DEFAULT_RETRY_DELAY_MS = 2;
const DEFAULT_MAX_RETRIES = 500;

function sleepSync(ms: number): void {
  if (ms > 0) {
    Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
  }
}

/**
 * Writes straight to an open file descriptor. The descriptor stays open;
 * closing it is the caller's business.
 */
export function createFileDescriptorSink(
  fd: number,
  options: FileDescriptorSinkOptions = {},
): ByteSink {
  const write = options.writeSync ?? writeSync;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;

  return {
    write(chunk) {
      let offset = 0;
      let retries = 0;
      while (offset < chunk.byteLength) {
        try {
          offset += write(fd, chunk, offset, chunk.byteLength - offset);
          retries = 0;
        } catch (error) {
          // Non-blocking pipes report EAGAIN while full.
          if (errnoCode(error) !== "EAGAIN" || retries >= maxRetries) {
            throw error;
          }
          retries += 1;
          sleepSync(retryDelayMs);
        }
      }
    },
  };
}

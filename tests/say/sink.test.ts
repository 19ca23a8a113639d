import { closeSync, mkdtempSync, openSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, expect, it, jest } from "@jest/globals";

import {
  createBufferSink,
  createFileDescriptorSink,
  type WriteSyncFn,
} from "../../src/say/sink.js";

describe("createBufferSink", () => {
  it("accumulates chunks in order", () => {
    const sink = createBufferSink();

    sink.write(Buffer.from("ab", "utf8"));
    sink.write(new Uint8Array([0x63]));

    expect(sink.text()).toBe("abc");
    expect(sink.contents()).toEqual(Buffer.from("abc", "utf8"));
  });

  it("starts empty", () => {
    expect(createBufferSink().text()).toBe("");
  });
});

describe("createFileDescriptorSink", () => {
  it("keeps writing until a partial write completes", () => {
    const received: number[] = [];
    const writeSync = jest.fn<WriteSyncFn>((_fd, buffer, offset, length) => {
      const count = Math.min(2, length);
      received.push(...buffer.subarray(offset, offset + count));
      return count;
    });

    createFileDescriptorSink(7, { writeSync }).write(
      Buffer.from("hello", "utf8"),
    );

    expect(Buffer.from(received).toString("utf8")).toBe("hello");
    expect(writeSync).toHaveBeenCalledTimes(3);
    expect(writeSync.mock.calls[0]?.[0]).toBe(7);
  });

  it("retries when the descriptor reports EAGAIN", () => {
    let attempts = 0;
    const writeSync = jest.fn<WriteSyncFn>((_fd, _buffer, _offset, length) => {
      attempts += 1;
      if (attempts === 1) {
        throw Object.assign(new Error("busy"), { code: "EAGAIN" });
      }
      return length;
    });

    createFileDescriptorSink(1, { writeSync, retryDelayMs: 0 }).write(
      Buffer.from("ok"),
    );

    expect(writeSync).toHaveBeenCalledTimes(2);
  });

  it("gives up after a bounded number of EAGAIN retries", () => {
    const busy = Object.assign(new Error("busy"), { code: "EAGAIN" });
    const writeSync = jest.fn<WriteSyncFn>(() => {
      throw busy;
    });

    expect(() =>
      createFileDescriptorSink(1, {
        writeSync,
        retryDelayMs: 0,
        maxRetries: 3,
      }).write(Buffer.from("x")),
    ).toThrow(busy);
    expect(writeSync).toHaveBeenCalledTimes(4);
  });

  it("waits between EAGAIN retries", () => {
    let attempts = 0;
    const writeSync = jest.fn<WriteSyncFn>((_fd, _buffer, _offset, length) => {
      attempts += 1;
      if (attempts === 1) {
        throw Object.assign(new Error("busy"), { code: "EAGAIN" });
      }
      return length;
    });

    const started = Date.now();
    createFileDescriptorSink(1, { writeSync, retryDelayMs: 20 }).write(
      Buffer.from("ok"),
    );

    expect(Date.now() - started).toBeGreaterThanOrEqual(15);
  });

  it("propagates other write errors unchanged", () => {
    const failure = Object.assign(new Error("write EPIPE"), { code: "EPIPE" });
    const writeSync = jest.fn<WriteSyncFn>(() => {
      throw failure;
    });

    expect(() =>
      createFileDescriptorSink(1, { writeSync }).write(Buffer.from("x")),
    ).toThrow(failure);
  });

  it("writes to a real file descriptor", () => {
    const directory = mkdtempSync(join(tmpdir(), "ferris-says-sink-"));
    const path = join(directory, "out.txt");
    const fd = openSync(path, "w");
    try {
      createFileDescriptorSink(fd).write(Buffer.from("你好\n", "utf8"));
    } finally {
      closeSync(fd);
    }

    expect(readFileSync(path, "utf8")).toBe("你好\n");
    rmSync(directory, { recursive: true, force: true });
  });
});

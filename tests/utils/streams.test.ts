import { Readable } from "node:stream";

import { describe, expect, it } from "@jest/globals";

import { readStreamText } from "../../src/utils/streams.js";

describe("readStreamText", () => {
  it("joins buffer chunks before decoding", async () => {
    const bytes = Buffer.from("你好", "utf8");
    const stream = Readable.from([bytes.subarray(0, 2), bytes.subarray(2)]);

    await expect(readStreamText(stream)).resolves.toBe("你好");
  });

  it("accepts string chunks", async () => {
    await expect(readStreamText(Readable.from(["a", "b"]))).resolves.toBe(
      "ab",
    );
  });

  it("returns an empty string for an empty stream", async () => {
    await expect(readStreamText(Readable.from([]))).resolves.toBe("");
  });
});

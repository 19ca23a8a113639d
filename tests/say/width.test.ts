import { describe, expect, it } from "@jest/globals";

import { displayWidth, longestLineWidth } from "../../src/say/width.js";

describe("displayWidth", () => {
  it("counts ASCII characters as one column each", () => {
    expect(displayWidth("Hello fellow Rustaceans!")).toBe(24);
  });

  it("counts wide characters as two columns", () => {
    expect(displayWidth("你好")).toBe(4);
    expect(displayWidth("ＡB")).toBe(3);
  });

  it("counts combining marks as zero columns", () => {
    expect(displayWidth("e\u0301")).toBe(1);
  });

  it("counts combining marks outside the Latin block as zero columns", () => {
    expect(displayWidth("\u05e9\u05b8")).toBe(1);
    expect(displayWidth("\u0915\u0902")).toBe(1);
    expect(displayWidth("v\u20d7")).toBe(1);
  });

  it("counts format characters as zero columns", () => {
    expect(displayWidth("a\u200bb")).toBe(2);
    expect(displayWidth("a\u200db")).toBe(2);
    expect(displayWidth("\ufeffx")).toBe(1);
  });

  it("counts an emoji as two columns", () => {
    expect(displayWidth("\u{1F44D}")).toBe(2);
  });

  it("returns zero for the empty string", () => {
    expect(displayWidth("")).toBe(0);
  });
});

describe("longestLineWidth", () => {
  it("returns the widest line by display width", () => {
    expect(longestLineWidth(["abcde", "你好世"])).toBe(6);
  });

  it("returns zero when there are no lines", () => {
    expect(longestLineWidth([])).toBe(0);
  });
});

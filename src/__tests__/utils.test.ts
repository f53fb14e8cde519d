import { describe, it, expect } from "vitest";
import { hexToRgb, padEndToWidth, padStartToWidth, sliceToWidth } from "../utils.js";

describe("sliceToWidth", () => {
  it("should keep strings that fit", () => {
    expect(sliceToWidth("hello", 5)).toEqual({ text: "hello", width: 5 });
  });

  it("should cut at the last whole character that fits", () => {
    expect(sliceToWidth("hello", 3)).toEqual({ text: "hel", width: 3 });
    expect(sliceToWidth("中文字", 5)).toEqual({ text: "中文", width: 4 });
  });

  it("should not split an emoji", () => {
    expect(sliceToWidth("a👉b", 2)).toEqual({ text: "a", width: 1 });
    expect(sliceToWidth("a👉b", 3)).toEqual({ text: "a👉", width: 3 });
  });

  it("should keep joined emoji sequences whole", () => {
    const family = "👨\u200d👩\u200d👧";
    expect(sliceToWidth(`${family}x`, 2)).toEqual({ text: family, width: 2 });
    expect(sliceToWidth(`a${family}`, 2)).toEqual({ text: "a", width: 1 });
  });

  it("should return nothing for a non-positive width", () => {
    expect(sliceToWidth("abc", 0)).toEqual({ text: "", width: 0 });
    expect(sliceToWidth("abc", -2)).toEqual({ text: "", width: 0 });
  });
});

describe("padding", () => {
  it("should pad by visual width", () => {
    expect(padEndToWidth("中", 4)).toBe("中  ");
    expect(padStartToWidth("7", 3)).toBe("  7");
    expect(padEndToWidth("long", 2)).toBe("long");
  });
});

describe("hexToRgb", () => {
  it("should parse theme colors", () => {
    expect(hexToRgb("#cba6f7")).toEqual([203, 166, 247]);
    expect(hexToRgb("F38BA8")).toEqual([243, 139, 168]);
  });

  it("should map garbage to white", () => {
    expect(hexToRgb("red")).toEqual([255, 255, 255]);
  });
});

import { describe, it, expect } from "vitest";
import { MaxLenWriter } from "../max-len-writer.js";
import { RecordingTerminal } from "../../list/__tests__/helpers.js";

function setup(maxLen: number) {
  const term = new RecordingTerminal(1);
  return { term, writer: new MaxLenWriter(term, maxLen) };
}

describe("MaxLenWriter", () => {
  it("should write text that fits unchanged", () => {
    const { term, writer } = setup(10);
    writer.writeAscii("abc");
    writer.writeText("def");
    expect(term.lines[0]).toBe("abcdef");
    expect(writer.remaining).toBe(4);
  });

  it("should drop what does not fit", () => {
    const { term, writer } = setup(5);
    writer.writeAscii("abc");
    writer.writeAscii("defgh");
    writer.writeAscii("ijk");
    expect(term.lines[0]).toBe("abcde");
    expect(writer.remaining).toBe(0);
  });

  it("should count wide characters as two columns", () => {
    const { term, writer } = setup(5);
    writer.writeText("日本語");
    expect(term.lines[0]).toBe("日本");
    expect(writer.columns).toBe(4);
    writer.writeText("語");
    expect(term.lines[0]).toBe("日本");
    writer.writeText("x");
    expect(term.lines[0]).toBe("日本x");
  });

  it("should account for credited columns", () => {
    const { term, writer } = setup(6);
    writer.addToLen(2);
    term.write("👉");
    writer.writeAscii("abcdef");
    expect(term.lines[0]).toBe("👉abcd");
    expect(writer.columns).toBe(6);
  });

  it("should write nothing with a zero budget", () => {
    const { term, writer } = setup(0);
    writer.writeAscii("abc");
    writer.writeText("日");
    expect(term.lines[0]).toBe("");
  });
});

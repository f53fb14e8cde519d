import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { tmpdir } from "node:os";
import { configDir, loadConfig } from "../config.js";

let testDir: string;

beforeEach(() => {
  testDir = join(tmpdir(), `config-test-${Date.now()}`);
  mkdirSync(testDir, { recursive: true });
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

function writeConfig(content: unknown): void {
  writeFileSync(join(testDir, "config.json"), JSON.stringify(content));
}

describe("loadConfig", () => {
  it("should honor LESSON_LIST_HOME", () => {
    expect(configDir({ LESSON_LIST_HOME: testDir })).toBe(testDir);
  });

  it("should use defaults without a config file", () => {
    const config = loadConfig({ LESSON_LIST_HOME: testDir }, "/work/course");
    expect(config).toEqual({
      courseDir: resolve("/work/course"),
      logLevel: "info",
      logFile: join(testDir, "lesson-list.log"),
      warning: undefined,
    });
  });

  it("should read settings and resolve the course directory", () => {
    writeConfig({ courseDir: "rust-course", logLevel: "debug", logFile: "/tmp/ll.log", theme: "dark" });
    const config = loadConfig({ LESSON_LIST_HOME: testDir }, "/work");
    expect(config.courseDir).toBe(resolve("/work", "rust-course"));
    expect(config.logLevel).toBe("debug");
    expect(config.logFile).toBe("/tmp/ll.log");
  });

  it("should let LOG_LEVEL override the file", () => {
    writeConfig({ logLevel: "debug" });
    const config = loadConfig({ LESSON_LIST_HOME: testDir, LOG_LEVEL: "warn" }, "/work");
    expect(config.logLevel).toBe("warn");
  });

  it("should ignore an unknown LOG_LEVEL", () => {
    const config = loadConfig({ LESSON_LIST_HOME: testDir, LOG_LEVEL: "loud" }, "/work");
    expect(config.logLevel).toBe("info");
  });

  it("should fall back to defaults with a warning for an invalid file", () => {
    writeConfig({ logLevel: "chatty" });
    const config = loadConfig({ LESSON_LIST_HOME: testDir }, "/work");
    expect(config.logLevel).toBe("info");
    expect(config.warning).toMatch(/^Ignoring invalid .*config\.json: logLevel: /);
  });

  it("should treat unparsable JSON as missing", () => {
    writeFileSync(join(testDir, "config.json"), "{ not json");
    const config = loadConfig({ LESSON_LIST_HOME: testDir }, "/work");
    expect(config.warning).toBeUndefined();
    expect(config.logLevel).toBe("info");
  });
});

/**
 * Config utility: reads ~/.lesson-list/config.json
 *
 * The directory can be moved with LESSON_LIST_HOME. Unknown keys pass
 * through so other tools can share the file.
 */
import { readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import type { LogLevel } from "./logger.js";

export function configDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.LESSON_LIST_HOME ?? join(homedir(), ".lesson-list");
}

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

const configSchema = z
  .object({
    courseDir: z.string().optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
    logFile: z.string().optional(),
  })
  .passthrough();

type RawConfig = z.infer<typeof configSchema>;

export interface ListConfig {
  courseDir: string;
  logLevel: LogLevel;
  logFile: string;
  /** Set when the file existed but did not validate; defaults were used. */
  warning?: string;
}

function readConfig(path: string): { config: RawConfig; warning?: string } {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch {
    // Missing or unreadable: all defaults
    return { config: {} };
  }
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    return { config: {}, warning: `Ignoring invalid ${path}: ${issues}` };
  }
  return { config: result.data };
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ListConfig {
  const dir = configDir(env);
  const { config, warning } = readConfig(join(dir, "config.json"));
  const envLevel = env.LOG_LEVEL;
  return {
    courseDir: resolve(cwd, config.courseDir ?? "."),
    logLevel: isLogLevel(envLevel) ? envLevel : (config.logLevel ?? "info"),
    logFile: config.logFile ?? join(dir, "lesson-list.log"),
    warning,
  };
}


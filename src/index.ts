#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { initLogger, createLogger } from "./logger.js";
import { FileProgressStore } from "./store/progress-store.js";
import { runListSession } from "./list/session.js";
import { errorMessage } from "./errors.js";

async function main(): Promise<number> {
  const config = loadConfig();
  initLogger({ level: config.logLevel, destination: config.logFile });
  const log = createLogger("cli");
  if (config.warning) log.warn(config.warning);

  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    process.stderr.write("lesson-list needs an interactive terminal\n");
    return 1;
  }

  const store = FileProgressStore.open(config.courseDir);
  const { store: returned, outcome } = await runListSession(store, undefined, {
    baseDir: config.courseDir,
  });

  if (outcome === "continue") {
    const current = returned.exercises()[returned.currentExerciseIndex()];
    process.stdout.write(`Continuing at ${current.name}\n`);
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    createLogger("cli").error("fatal", err);
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    process.exitCode = 1;
  },
);

import { realpathSync } from "node:fs";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import type { MaxLenWriter } from "./max-len-writer.js";
import type { TermColor } from "./terminal.js";
import { C, theme } from "../theme.js";
import { padStartToWidth } from "../utils.js";

const PROGRESS_PREFIX = "Progress: [";
// "] xxx/xxx"
const PROGRESS_POSTFIX_WIDTH = 9;
const PROGRESS_WRAPPER_WIDTH = PROGRESS_PREFIX.length + PROGRESS_POSTFIX_WIDTH;
const PROGRESS_MIN_LINE_WIDTH = PROGRESS_WRAPPER_WIDTH + 4;

/**
 * One-line progress bar sized to the terminal width:
 *
 *   Progress: [██████░░░░░░░░]   3/10
 *
 * Falls back to "Progress: 3/10" when there is no room for a bar.
 */
export function progressBar(
  writer: MaxLenWriter,
  done: number,
  total: number,
  termWidth: number,
): void {
  if (termWidth < PROGRESS_MIN_LINE_WIDTH) {
    writer.writeAscii(`Progress: ${done}/${total}`);
    return;
  }

  const width = termWidth - PROGRESS_WRAPPER_WIDTH;
  const filled = total > 0 ? Math.min(width, Math.floor((width * done) / total)) : 0;

  writer.writeAscii(PROGRESS_PREFIX);
  writer.terminal.setForeground(C.success);
  writer.writeAscii(theme.progress.filled.repeat(filled));
  writer.terminal.setForeground(C.dim);
  writer.writeAscii(theme.progress.empty.repeat(width - filled));
  writer.terminal.setForeground("reset");
  writer.writeAscii(`] ${padStartToWidth(String(done), 3)}/${total}`);
}

function resolveFileUrl(path: string): string | undefined {
  try {
    return pathToFileURL(realpathSync(path)).href;
  } catch {
    // Not on disk (yet): no link target
    return undefined;
  }
}

/**
 * Write `path` as an OSC 8 hyperlink to the file. Only the visible path
 * counts against the writer's budget; the escape sequences take no columns.
 */
export function terminalFileLink(
  writer: MaxLenWriter,
  path: string,
  color: TermColor,
  baseDir = ".",
): void {
  const url = resolveFileUrl(resolve(baseDir, path));
  if (url === undefined) {
    writer.writeText(path);
    return;
  }

  const term = writer.terminal;
  term.setForeground(color);
  term.setUnderline();
  term.write(`\x1B]8;;${url}\x1B\\`);
  writer.writeText(path);
  term.write("\x1B]8;;\x1B\\");
  term.setForeground("reset");
  term.setNoUnderline();
}

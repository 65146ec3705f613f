/**
 * Output rendering helpers
 */

import type { CliIo } from "./io.js";

type Color = "red";

/**
 * Print JSON to stdout
 */
export function printJson(io: CliIo, data: unknown): void {
  io.writeStdout(JSON.stringify(data, null, 2) + "\n");
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(io: CliIo, lines: Iterable<string>): void {
  for (const line of lines) {
    io.writeStdout(line + "\n");
  }
}

/**
 * Apply ANSI color only if the target stream is a TTY
 */
export function colorize(text: string, color: Color, isTTY: boolean): string {
  if (!isTTY) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

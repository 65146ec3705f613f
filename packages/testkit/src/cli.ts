/**
 * CLI testing utilities
 */

import { execa } from "execa";

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
  /** Terminating signal when the process didn't exit normally */
  signal: NodeJS.Signals | null;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Current working directory */
  cwd?: string;
  /** Environment variables */
  env?: Record<string, string>;
  /** Input to pass to stdin */
  input?: string;
  /** Module registered with `node --import` before the CLI loads, e.g. "tsx" */
  loader?: string;
  /** Extra package export conditions passed with `node --conditions` */
  conditions?: string[];
  /** Kill the process after this many milliseconds (default: 10000) */
  timeout?: number;
}

/**
 * Execute a CLI script with node. Non-zero exits resolve rather than reject.
 * @param cliPath - Path to CLI script
 * @param args - Command arguments
 * @param options - Execution options
 * @returns CLI result with stdout, stderr, exitCode
 */
export async function runCli(
  cliPath: string,
  args: string[],
  options: CliExecOptions = {}
): Promise<CliResult> {
  const { cwd, env, input, loader, conditions = [], timeout = 10000 } = options;
  const nodeArgs = [
    ...conditions.map((condition) => `--conditions=${condition}`),
    ...(loader ? ["--import", loader] : []),
  ];

  const result = await execa("node", [...nodeArgs, cliPath, ...args], {
    cwd,
    env: { ...process.env, ...env },
    input,
    timeout,
    reject: false,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? null,
    signal: result.signal ?? null,
  };
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 * @returns Parsed JSON value
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}

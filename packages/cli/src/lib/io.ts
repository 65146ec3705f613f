/**
 * I/O helpers for CLI
 */

/**
 * Output streams the CLI writes to
 */
export interface CliIo {
  /** Write to stdout */
  writeStdout(content: string): void;
  /** Write to stderr */
  writeStderr(content: string): void;
  /** Whether stderr is an interactive terminal */
  readonly stderrIsTTY: boolean;
}

/**
 * Process-backed streams
 */
export const processIo: CliIo = {
  writeStdout(content: string): void {
    process.stdout.write(content);
  },
  writeStderr(content: string): void {
    process.stderr.write(content);
  },
  get stderrIsTTY(): boolean {
    return process.stderr.isTTY ?? false;
  },
};

/**
 * In-memory streams, for tests and embedding
 */
export interface CapturedIo extends CliIo {
  readonly stdout: string;
  readonly stderr: string;
}

export function captureIo(): CapturedIo {
  let stdout = "";
  let stderr = "";

  return {
    writeStdout(content: string): void {
      stdout += content;
    },
    writeStderr(content: string): void {
      stderr += content;
    },
    stderrIsTTY: false,
    get stdout(): string {
      return stdout;
    },
    get stderr(): string {
      return stderr;
    },
  };
}

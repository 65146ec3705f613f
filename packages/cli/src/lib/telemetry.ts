/**
 * Telemetry and observability helpers
 */

import type { CliIo } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Format a metric line
 */
export function formatMetric(key: string, fields: Record<string, unknown>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }
  return parts.join(" ");
}

/**
 * Wrap an async function with timing metrics, written to stderr when verbose
 */
export async function withTiming<T>(
  label: string,
  options: { io: CliIo; verbose: boolean },
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    if (options.verbose) {
      const duration = Date.now() - start;
      options.io.writeStderr(formatMetric(label, { duration_ms: duration, success }) + "\n");
    }
  }
}

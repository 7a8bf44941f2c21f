/**
 * Telemetry emitted to stderr in verbose mode
 */

import { metrics } from "@searchmap/sdk";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric line to stderr if verbose mode is enabled
 */
export function emitMetric(key: string, fields: Record<string, unknown>): void {
  if (!isVerbose()) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  writeStderr(parts.join(" ") + "\n");
}

/**
 * Emit the SDK's counters for one indexer type tag
 */
export function emitIndexerMetrics(typeTag: string): void {
  const recorded = metrics.getMetrics(typeTag);
  if (!recorded) {
    return;
  }

  emitMetric(`indexer.${typeTag}`, {
    documents_added: recorded.documentsAdded,
    add_calls: recorded.addCalls,
    commits: recorded.commits,
    deletes: recorded.deletes,
    skipped: recorded.skippedRecords,
    failures: recorded.failures,
    p95_flush_ms: Math.round(metrics.getP95FlushTime(typeTag)),
  });
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    emitMetric(label, {
      duration_ms: Date.now() - start,
      success,
    });
  }
}

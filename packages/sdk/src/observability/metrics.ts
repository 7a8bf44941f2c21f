/**
 * Metrics tracking for indexing operations, keyed by indexer type tag
 */

const MAX_SAMPLES = 100;

export interface IndexerMetrics {
  documentsAdded: number;
  addCalls: number;
  commits: number;
  deletes: number;
  skippedRecords: number;
  failures: number;
  flushTimeMs: number[];
  reindexTimeMs: number[];
}

function pushSample(samples: number[], ms: number): void {
  samples.push(ms);

  // Keep only the most recent samples
  if (samples.length > MAX_SAMPLES) {
    samples.shift();
  }
}

class MetricsCollector {
  #metrics = new Map<string, IndexerMetrics>();

  /**
   * Get or create metrics for a type tag
   */
  #getMetrics(type: string): IndexerMetrics {
    let metrics = this.#metrics.get(type);
    if (!metrics) {
      metrics = {
        documentsAdded: 0,
        addCalls: 0,
        commits: 0,
        deletes: 0,
        skippedRecords: 0,
        failures: 0,
        flushTimeMs: [],
        reindexTimeMs: [],
      };
      this.#metrics.set(type, metrics);
    }
    return metrics;
  }

  /**
   * Record one backend add call and its duration
   */
  recordAdd(type: string, documents: number, ms: number): void {
    const metrics = this.#getMetrics(type);
    metrics.addCalls++;
    metrics.documentsAdded += documents;
    pushSample(metrics.flushTimeMs, ms);
  }

  recordCommit(type: string): void {
    this.#getMetrics(type).commits++;
  }

  recordDelete(type: string): void {
    this.#getMetrics(type).deletes++;
  }

  recordSkip(type: string): void {
    this.#getMetrics(type).skippedRecords++;
  }

  recordFailure(type: string): void {
    this.#getMetrics(type).failures++;
  }

  recordReindexTime(type: string, ms: number): void {
    pushSample(this.#getMetrics(type).reindexTimeMs, ms);
  }

  /**
   * Get metrics for a type tag
   */
  getMetrics(type: string): IndexerMetrics | undefined {
    return this.#metrics.get(type);
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: readonly number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  /**
   * Get p95 flush time for a type tag
   */
  getP95FlushTime(type: string): number {
    return this.getP95(this.#getMetrics(type).flushTimeMs);
  }

  /**
   * Reset metrics for one type tag, or all of them
   */
  reset(type?: string): void {
    if (type) {
      this.#metrics.delete(type);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();

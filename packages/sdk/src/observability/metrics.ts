/**
 * Metrics tracking for container flushes and cache traffic
 */

export interface CollectionMetrics {
  hitCount: number;
  missCount: number;
  flushCount: number;
  writeCount: number;
  removeCount: number;
  flushTimeMs: number[];
}

/** Counts reported by one flush of one container */
export interface FlushReport {
  writes: number;
  removes: number;
  ms: number;
}

const MAX_SAMPLES = 100;

/** Containers tracked at once; the least recently created is dropped first */
export const MAX_TRACKED_CONTAINERS = 1024;

class MetricsCollector {
  #metrics = new Map<string, CollectionMetrics>();

  /**
   * Get or create metrics for a container
   */
  #getMetrics(kind: string, prefix: string): CollectionMetrics {
    const key = `${kind}@${prefix}`;
    let metrics = this.#metrics.get(key);
    if (!metrics) {
      if (this.#metrics.size >= MAX_TRACKED_CONTAINERS) {
        const oldest = this.#metrics.keys().next();
        if (!oldest.done) this.#metrics.delete(oldest.value);
      }
      metrics = {
        hitCount: 0,
        missCount: 0,
        flushCount: 0,
        writeCount: 0,
        removeCount: 0,
        flushTimeMs: [],
      };
      this.#metrics.set(key, metrics);
    }
    return metrics;
  }

  recordHit(kind: string, prefix: string): void {
    this.#getMetrics(kind, prefix).hitCount++;
  }

  recordMiss(kind: string, prefix: string): void {
    this.#getMetrics(kind, prefix).missCount++;
  }

  /**
   * Record the outcome of one flush
   */
  recordFlush(kind: string, prefix: string, report: FlushReport): void {
    const metrics = this.#getMetrics(kind, prefix);
    metrics.flushCount++;
    metrics.writeCount += report.writes;
    metrics.removeCount += report.removes;
    metrics.flushTimeMs.push(report.ms);

    // Keep only the most recent samples to avoid unbounded memory growth
    if (metrics.flushTimeMs.length > MAX_SAMPLES) {
      metrics.flushTimeMs.shift();
    }
  }

  getMetrics(kind: string, prefix: string): CollectionMetrics | undefined {
    return this.#metrics.get(`${kind}@${prefix}`);
  }

  getAllMetrics(): Map<string, CollectionMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Cache hit rate for a container
   */
  getHitRate(kind: string, prefix: string): number {
    const metrics = this.#metrics.get(`${kind}@${prefix}`);
    if (!metrics) return 0;
    const total = metrics.hitCount + metrics.missCount;
    return total > 0 ? metrics.hitCount / total : 0;
  }

  /**
   * Calculate p95 for a list of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  getP95FlushTime(kind: string, prefix: string): number {
    const metrics = this.#metrics.get(`${kind}@${prefix}`);
    return metrics ? this.getP95(metrics.flushTimeMs) : 0;
  }

  /**
   * Reset metrics for one container, or all of them
   */
  reset(kind?: string, prefix?: string): void {
    if (kind && prefix !== undefined) {
      this.#metrics.delete(`${kind}@${prefix}`);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();

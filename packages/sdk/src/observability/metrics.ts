/**
 * Comparison metrics for index lookups
 */

export type IndexName = "id" | "last";

export interface IndexMetrics {
  lookups: number;
  hitCount: number;
  missCount: number;
  /** Comparisons per lookup, most recent last */
  comparisons: number[];
}

const MAX_SAMPLES = 100;

class MetricsCollector {
  #metrics = new Map<IndexName, IndexMetrics>();

  #getMetrics(index: IndexName): IndexMetrics {
    let metrics = this.#metrics.get(index);
    if (!metrics) {
      metrics = { lookups: 0, hitCount: 0, missCount: 0, comparisons: [] };
      this.#metrics.set(index, metrics);
    }
    return metrics;
  }

  /**
   * Record one engine-level lookup against an index
   * @param hit - Whether the lookup produced at least one live record
   */
  recordLookup(index: IndexName, comparisons: number, hit: boolean): void {
    const metrics = this.#getMetrics(index);
    metrics.lookups++;
    if (hit) {
      metrics.hitCount++;
    } else {
      metrics.missCount++;
    }

    metrics.comparisons.push(comparisons);
    if (metrics.comparisons.length > MAX_SAMPLES) {
      metrics.comparisons.shift();
    }
  }

  getMetrics(index: IndexName): IndexMetrics | undefined {
    return this.#metrics.get(index);
  }

  getAllMetrics(): Map<IndexName, IndexMetrics> {
    return new Map(this.#metrics);
  }

  getHitRate(index: IndexName): number {
    const metrics = this.#getMetrics(index);
    const total = metrics.hitCount + metrics.missCount;
    return total > 0 ? metrics.hitCount / total : 0;
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  getP95Comparisons(index: IndexName): number {
    return this.getP95(this.#getMetrics(index).comparisons);
  }

  /**
   * Reset metrics for one index, or for all of them
   */
  reset(index?: IndexName): void {
    if (index) {
      this.#metrics.delete(index);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();

/**
 * Lookup cost benchmarks: comparison counts by insertion order
 * Run with: npm run bench
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { performance } from "node:perf_hooks";
import { createEngine } from "../src/engine.js";
import { logger } from "../src/observability/logs.js";

// Only run benchmarks if VITEST_PERF is set
const describeIf = process.env.VITEST_PERF ? describe : describe.skip;

interface Row {
  id: number;
  last: string;
}

const SIZE = 4000;

function shuffledIds(count: number): number[] {
  const ids = Array.from({ length: count }, (_, i) => i + 1);
  let state = 7;
  for (let i = ids.length - 1; i > 0; i--) {
    state = (state * 48271) % 2147483647;
    const j = state % (i + 1);
    const a = ids[i];
    const b = ids[j];
    if (a === undefined || b === undefined) continue;
    ids[i] = b;
    ids[j] = a;
  }
  return ids;
}

function averageFindCost(order: number[]): { comparisons: number; ms: number } {
  const engine = createEngine<Row>();
  for (const id of order) {
    engine.insertRecord({ id, last: `Name${id % 50}` });
  }

  const start = performance.now();
  let total = 0;
  for (let id = 1; id <= SIZE; id++) {
    total += engine.findById(id).comparisons;
  }
  return { comparisons: total / SIZE, ms: performance.now() - start };
}

describeIf("Lookup cost by insertion order", () => {
  beforeAll(() => {
    logger.setEnabled(false);
  });

  afterAll(() => {
    logger.setEnabled(true);
  });

  it("random order keeps average lookups logarithmic", { timeout: 60000 }, () => {
    const { comparisons, ms } = averageFindCost(shuffledIds(SIZE));
    console.log(`random order: ${comparisons.toFixed(1)} comparisons/lookup, ${ms.toFixed(2)}ms`);

    // Expected depth of a random BST is about 2 ln n
    expect(comparisons).toBeLessThan(4 * Math.log(SIZE));
  });

  it("sorted order degrades lookups to a linear scan", { timeout: 60000 }, () => {
    const sorted = Array.from({ length: SIZE }, (_, i) => i + 1);
    const { comparisons, ms } = averageFindCost(sorted);
    console.log(`sorted order: ${comparisons.toFixed(1)} comparisons/lookup, ${ms.toFixed(2)}ms`);

    expect(comparisons).toBe((SIZE + 1) / 2);
  });
});

/**
 * Stage threshold bookkeeping.
 *
 * A StageMap records, for each cumulative-GDD threshold, the first date the
 * running total reached it (or null). Maps are never mutated: markCrossings()
 * returns a new map and only ever fills null entries, so a date once set
 * stays set for the rest of the run.
 */

export type StageMap = ReadonlyMap<number, string | null>;

/**
 * Create a map with every threshold unreached, ordered by ascending threshold.
 */
export function createStageMap(targets: Iterable<number>): StageMap {
  const sorted = [...new Set(targets)].sort((a, b) => a - b);
  return new Map(sorted.map((t) => [t, null]));
}

/**
 * Fill in every unreached threshold that cumulativeGdd has met or passed.
 *
 * @returns The same map if nothing changed, otherwise a new map
 */
export function markCrossings(stages: StageMap, cumulativeGdd: number, date: string): StageMap {
  let next: Map<number, string | null> | null = null;

  for (const [threshold, reachedOn] of stages) {
    if (reachedOn === null && cumulativeGdd >= threshold) {
      next ??= new Map(stages);
      next.set(threshold, date);
    }
  }

  return next ?? stages;
}

/** Largest threshold, i.e. the one that ends a run once reached */
export function highestThreshold(stages: StageMap): number {
  return Math.max(...stages.keys());
}

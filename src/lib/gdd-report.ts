/**
 * Text output for simulation results: stage labels, history tables, CSV.
 */

import type { GddRecord } from './gdd';
import type { SimulationResult } from './gdd-simulation';
import type { StageMap } from './stage-map';

/** Agronomic names for the default thresholds */
export const STAGE_LABELS: Readonly<Record<number, string>> = {
  100: 'Blowing date',
  300: 'Sprout',
  500: 'Bloom',
  1000: 'Colour change / Harvest',
};

/**
 * "Bloom (500 GDD)", or just "750 GDD" for thresholds without a name.
 */
export function stageLabel(threshold: number): string {
  const name = STAGE_LABELS[threshold];
  return name ? `${name} (${threshold} GDD)` : `${threshold} GDD`;
}

export function formatStageLines(stageDates: StageMap): string[] {
  return [...stageDates].map(
    ([threshold, reachedOn]) => `- ${stageLabel(threshold)}: ${reachedOn ?? 'not reached'}`
  );
}

function num(value: number, digits: number, width: number): string {
  return value.toFixed(digits).padStart(width);
}

/**
 * Fixed-width table of records. Pass `lastN` to show only the tail.
 */
export function formatHistoryTable(records: readonly GddRecord[], lastN?: number): string {
  const rows = lastN === undefined ? records : records.slice(-lastN);
  const header = ['date'.padEnd(10), 'tmax'.padStart(7), 'tmin'.padStart(7), 'gdd_day'.padStart(9), 'gdd_cum'.padStart(9)];
  const lines = [header.join(' ')];
  for (const r of rows) {
    lines.push([r.date.padEnd(10), num(r.tmax, 1, 7), num(r.tmin, 1, 7), num(r.gddDay, 2, 9), num(r.gddCum, 2, 9)].join(' '));
  }
  return lines.join('\n');
}

export function toCsv(records: readonly GddRecord[]): string {
  const lines = ['date,tmax,tmin,gdd_day,gdd_cum'];
  for (const r of records) {
    lines.push(`${r.date},${r.tmax},${r.tmin},${r.gddDay},${r.gddCum}`);
  }
  return lines.join('\n') + '\n';
}

/**
 * One-line summary of how the run ended.
 */
export function describeOutcome(result: SimulationResult): string {
  const days = result.records.length;
  const total = result.totalGdd.toFixed(1);
  const lastDate = result.records.at(-1)?.date;

  switch (result.stopReason) {
    case 'targets_reached':
      return `All targets reached: ${total} GDD by ${lastDate ?? 'start date'}`;
    case 'horizon_exhausted':
      if (days === 0) return 'No GDD data could be calculated (NASA POWER did not return data).';
      return `Horizon reached after ${days} days with ${total} GDD`;
    case 'fetch_failed':
      return `Incomplete: stopped after ${days} days with ${total} GDD (${result.error.message})`;
    case 'cancelled':
      return `Cancelled after ${days} days with ${total} GDD`;
  }
}

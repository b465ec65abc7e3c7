/**
 * Tests for the block-fetching GDD accumulation engine.
 *
 * All runs use fake clients that serve in-memory observations, so every
 * expected date and total can be worked out by hand: 30/20 °C over a 10 °C
 * base is 15 GDD per day.
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError, DataError, RemoteServiceError } from '../errors';
import { addDaysToIsoDate } from '../date-utils';
import type { DailyObservation } from '../gdd';
import { createSimulationConfig, runGddSimulation, type SimulationConfig } from '../gdd-simulation';
import {
  createFakeClient,
  createObservations,
  createProgressRecorder,
  createScriptedClient,
} from './test-helpers';

const START = '2025-06-01';

function config(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  return createSimulationConfig({
    latitude: 13.08,
    longitude: 80.27,
    startDate: START,
    baseTemperature: 10,
    ...overrides,
  });
}

describe('runGddSimulation: reference scenarios', () => {
  it('finds the first crossing of 100 GDD on day 7 and leaves 300 unreached', async () => {
    const client = createFakeClient(createObservations(START, 10));
    const result = await runGddSimulation(config({ targets: [100, 300], maxHorizonDays: 9 }), { client });

    expect(result.records).toHaveLength(10);
    expect(result.records[6]).toEqual({ date: '2025-06-07', tmax: 30, tmin: 20, gddDay: 15, gddCum: 105 });
    expect(result.stageDates.get(100)).toBe('2025-06-07');
    expect(result.stageDates.get(300)).toBeNull();
    expect(result.totalGdd).toBe(150);
    expect(result.completed).toBe(true);
    expect(result.stopReason).toBe('horizon_exhausted');
    expect(client.calls).toEqual([{ rangeStart: '2025-06-01', rangeEnd: '2025-06-10' }]);
  });

  it('treats blocks with no observations as valid and walks past them', async () => {
    const client = createFakeClient([]);
    const result = await runGddSimulation(config({ maxHorizonDays: 10, blockSizeDays: 3 }), { client });

    expect(result.records).toEqual([]);
    expect([...result.stageDates.values()]).toEqual([null, null, null, null]);
    expect(result.completed).toBe(true);
    expect(result.stopReason).toBe('horizon_exhausted');
    expect('error' in result).toBe(false);
    expect(client.calls).toEqual([
      { rangeStart: '2025-06-01', rangeEnd: '2025-06-03' },
      { rangeStart: '2025-06-04', rangeEnd: '2025-06-06' },
      { rangeStart: '2025-06-07', rangeEnd: '2025-06-09' },
      { rangeStart: '2025-06-10', rangeEnd: '2025-06-11' },
    ]);
  });

  it('returns an empty partial result with the error when the first block is rejected', async () => {
    const notFound = new RemoteServiceError('NASA POWER request rejected: 404', { status: 404, attempts: 1 });
    const client = createScriptedClient(() => {
      throw notFound;
    });
    const result = await runGddSimulation(config(), { client });

    expect(result.completed).toBe(false);
    expect(result.stopReason).toBe('fetch_failed');
    if (result.stopReason === 'fetch_failed') {
      expect(result.error).toBe(notFound);
    }
    expect(result.records).toEqual([]);
    expect(result.totalGdd).toBe(0);
    expect([...result.stageDates.values()].every((d) => d === null)).toBe(true);
    expect(client.calls).toHaveLength(1);
  });
});

describe('runGddSimulation: stopping', () => {
  it('stops mid-block the moment the highest target is reached', async () => {
    const client = createFakeClient(createObservations(START, 30));
    const result = await runGddSimulation(config({ targets: [60], blockSizeDays: 5 }), { client });

    expect(result.records.map((r) => r.date)).toEqual(['2025-06-01', '2025-06-02', '2025-06-03', '2025-06-04']);
    expect(result.stageDates.get(60)).toBe('2025-06-04');
    expect(result.stopReason).toBe('targets_reached');
    expect(client.calls).toHaveLength(1);
  });

  it('does not fetch another block when the target is hit on the last day of a block', async () => {
    const client = createFakeClient(createObservations(START, 30));
    const result = await runGddSimulation(config({ targets: [75], blockSizeDays: 5 }), { client });

    expect(result.records).toHaveLength(5);
    expect(result.totalGdd).toBe(75);
    expect(result.stopReason).toBe('targets_reached');
    expect(client.calls).toHaveLength(1);
  });

  it('runs across several blocks until the highest of unordered targets is reached', async () => {
    const client = createFakeClient(createObservations(START, 60));
    const result = await runGddSimulation(config({ targets: [300, 45, 150], blockSizeDays: 7 }), { client });

    expect(result.stageDates.get(45)).toBe('2025-06-03');
    expect(result.stageDates.get(150)).toBe('2025-06-10');
    expect(result.stageDates.get(300)).toBe('2025-06-20');
    expect(result.records).toHaveLength(20);
    expect(client.calls.map((c) => c.rangeStart)).toEqual(['2025-06-01', '2025-06-08', '2025-06-15']);
  });

  it('keeps everything accumulated before a later block fails', async () => {
    const client = createScriptedClient((rangeStart, rangeEnd, callIndex) => {
      if (callIndex === 1) throw new DataError('Invalid response format from NASA POWER');
      return createObservations(rangeStart, 5).filter((o) => o.date <= rangeEnd);
    });
    const progress = createProgressRecorder();
    const result = await runGddSimulation(config({ targets: [50, 500], blockSizeDays: 5 }), {
      client,
      onProgress: progress,
    });

    expect(result.completed).toBe(false);
    expect(result.stopReason).toBe('fetch_failed');
    expect(result.records).toHaveLength(5);
    expect(result.totalGdd).toBe(75);
    expect(result.stageDates.get(50)).toBe('2025-06-04');
    expect(result.stageDates.get(500)).toBeNull();
    expect(progress.events.at(-1)).toEqual({
      kind: 'fetch_failed',
      rangeStart: '2025-06-06',
      rangeEnd: '2025-06-10',
      error: 'Invalid response format from NASA POWER',
      message: 'Stopped: could not get data for 2025-06-06 to 2025-06-10 (Invalid response format from NASA POWER)',
    });
  });

  it('lets unexpected errors from the client propagate', async () => {
    const client = createScriptedClient(() => {
      throw new TypeError('boom');
    });
    await expect(runGddSimulation(config(), { client })).rejects.toThrow('boom');
  });

  it('returns an empty completed result without fetching when the horizon is zero days', async () => {
    const client = createFakeClient(createObservations(START, 10));
    const result = await runGddSimulation(config({ maxHorizonDays: 0 }), { client });

    expect(result.records).toEqual([]);
    expect(result.completed).toBe(true);
    expect(result.stopReason).toBe('horizon_exhausted');
    expect(client.calls).toEqual([]);
  });

  it('never requests past the horizon end', async () => {
    const client = createFakeClient(createObservations(START, 100, 12, 10));
    const result = await runGddSimulation(config({ targets: [10000], maxHorizonDays: 45, blockSizeDays: 30 }), {
      client,
    });

    expect(client.calls).toEqual([
      { rangeStart: '2025-06-01', rangeEnd: '2025-06-30' },
      { rangeStart: '2025-07-01', rangeEnd: '2025-07-16' },
    ]);
    expect(result.records).toHaveLength(46);
    expect(result.records.at(-1)?.date).toBe('2025-07-16');
  });
});

describe('runGddSimulation: cancellation', () => {
  it('stops before the next block once the signal is aborted', async () => {
    const controller = new AbortController();
    const data = createObservations(START, 30);
    const client = createScriptedClient((rangeStart, rangeEnd) => {
      controller.abort();
      return data.filter((o) => o.date >= rangeStart && o.date <= rangeEnd);
    });

    const result = await runGddSimulation(config({ blockSizeDays: 5 }), { client, signal: controller.signal });

    expect(result.completed).toBe(false);
    expect(result.stopReason).toBe('cancelled');
    expect(result.records).toHaveLength(5);
    expect(client.calls).toHaveLength(1);
  });

  it('does not fetch at all with an already-aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const client = createFakeClient(createObservations(START, 10));

    const result = await runGddSimulation(config(), { client, signal: controller.signal });
    expect(result.stopReason).toBe('cancelled');
    expect(client.calls).toEqual([]);
  });

  it('reports targets reached when they are met in the block that saw the abort', async () => {
    const controller = new AbortController();
    const data = createObservations(START, 10);
    const client = createScriptedClient((rangeStart, rangeEnd) => {
      controller.abort();
      return data.filter((o) => o.date >= rangeStart && o.date <= rangeEnd);
    });

    const result = await runGddSimulation(config({ targets: [100], blockSizeDays: 10 }), {
      client,
      signal: controller.signal,
    });

    expect(result.completed).toBe(true);
    expect(result.stopReason).toBe('targets_reached');
    expect(result.records).toHaveLength(7);
    expect(client.calls).toHaveLength(1);
  });
});

describe('runGddSimulation: record invariants', () => {
  function varyingObservations(count: number): DailyObservation[] {
    return Array.from({ length: count }, (_, i) => {
      const tmax = 4 + ((i * 7) % 25);
      return { date: addDaysToIsoDate(START, i), tmax, tmin: tmax - 9 };
    });
  }

  it('produces strictly ascending dates and a non-decreasing total', async () => {
    const client = createFakeClient(varyingObservations(90));
    const result = await runGddSimulation(config({ targets: [100000], maxHorizonDays: 89, blockSizeDays: 11 }), {
      client,
    });

    expect(result.records).toHaveLength(90);
    for (let i = 1; i < result.records.length; i++) {
      expect(result.records[i].date > result.records[i - 1].date).toBe(true);
      expect(result.records[i].gddCum).toBeGreaterThanOrEqual(result.records[i - 1].gddCum);
    }
  });

  it('sets each threshold to the earliest date the total reached it', async () => {
    const client = createFakeClient(varyingObservations(120));
    const targets = [20, 75, 150, 400];
    const result = await runGddSimulation(config({ targets, maxHorizonDays: 119, blockSizeDays: 13 }), { client });

    for (const t of targets) {
      const first = result.records.find((r) => r.gddCum >= t);
      expect(result.stageDates.get(t)).toBe(first ? first.date : null);
    }
  });

  it('skips gaps in sparse blocks and ignores repeated or out-of-order days', async () => {
    const client = createScriptedClient(() => [
      { date: '2025-06-02', tmax: 30, tmin: 20 },
      { date: '2025-06-01', tmax: 30, tmin: 20 },
      { date: '2025-06-02', tmax: 40, tmin: 30 },
      { date: '2025-06-05', tmax: 24, tmin: 16 },
    ]);
    const result = await runGddSimulation(config({ maxHorizonDays: 6, blockSizeDays: 10 }), { client });

    expect(result.records).toEqual([
      { date: '2025-06-02', tmax: 30, tmin: 20, gddDay: 15, gddCum: 15 },
      { date: '2025-06-05', tmax: 24, tmin: 16, gddDay: 10, gddCum: 25 },
    ]);
  });

  it('reports each block before fetching it', async () => {
    const client = createFakeClient([]);
    const progress = createProgressRecorder();
    await runGddSimulation(config({ maxHorizonDays: 7, blockSizeDays: 4 }), { client, onProgress: progress });

    expect(progress.events.map((e) => e.message)).toEqual([
      'Fetching NASA POWER data: 2025-06-01 to 2025-06-04',
      'Fetching NASA POWER data: 2025-06-05 to 2025-06-08',
    ]);
  });
});

describe('runGddSimulation: config validation', () => {
  const invalid: Array<[string, Partial<SimulationConfig>]> = [
    ['empty targets', { targets: [] }],
    ['duplicate targets', { targets: [100, 100] }],
    ['non-positive target', { targets: [0, 100] }],
    ['bad start date', { startDate: '2025-02-30' }],
    ['latitude out of range', { latitude: 95 }],
    ['longitude out of range', { longitude: -181 }],
    ['zero block size', { blockSizeDays: 0 }],
    ['fractional horizon', { maxHorizonDays: 1.5 }],
    ['NaN base temperature', { baseTemperature: Number.NaN }],
    ['horizon past year 9999', { startDate: '9999-12-01', maxHorizonDays: 60 }],
  ];

  it.each(invalid)('rejects %s before fetching', async (_name, overrides) => {
    const client = createFakeClient(createObservations(START, 10));
    await expect(runGddSimulation(config(overrides), { client })).rejects.toBeInstanceOf(ConfigurationError);
    expect(client.calls).toEqual([]);
  });
});

describe('runGddSimulation: latest supported date', () => {
  it('accepts a horizon that ends exactly on 9999-12-31', async () => {
    const client = createFakeClient([]);
    const result = await runGddSimulation(
      config({ startDate: '9999-12-01', maxHorizonDays: 30, blockSizeDays: 31 }),
      { client }
    );

    expect(result.stopReason).toBe('horizon_exhausted');
    expect(client.calls).toEqual([{ rangeStart: '9999-12-01', rangeEnd: '9999-12-31' }]);
  });
});

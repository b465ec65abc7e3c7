#!/usr/bin/env npx tsx
/**
 * Run a GDD simulation for one location and print the predicted stage dates.
 *
 * Fetches NASA POWER daily temperatures in blocks from the start date until
 * the highest target is reached or the horizon runs out. Ctrl+C stops after
 * the block in flight and still prints what was accumulated.
 *
 * Usage:
 *   npx tsx scripts/run-gdd-simulation.ts --place "Chennai, India" --start 2025-01-01
 *   npx tsx scripts/run-gdd-simulation.ts --lat 13.0827 --lon 80.2707 --targets 100,300 --csv out.csv
 *
 * Exit codes: 0 finished, 1 bad input or geocoding failure, 2 stopped on a
 * NASA POWER failure, 130 cancelled.
 */

import fs from 'fs';
import { parseCliArgs, USAGE, type CliOptions } from '../src/lib/cli-args';
import { loadAppConfig, requireOpenCageKey, resolveLogDir, type AppConfig } from '../src/lib/config';
import { ConfigurationError, GeocodeError } from '../src/lib/errors';
import { geocodePlace, type GeocodedLocation } from '../src/lib/geocode';
import { describeOutcome, formatHistoryTable, formatStageLines, toCsv } from '../src/lib/gdd-report';
import {
  createSimulationConfig,
  runGddSimulation,
  validateRunSettings,
  type SimulationResult,
} from '../src/lib/gdd-simulation';
import { createPowerClient } from '../src/lib/power-client';
import { combineProgress, createConsoleProgress, createLogProgress, noopProgress } from '../src/lib/progress';
import { logEvent } from '../src/lib/server-logger';

const HISTORY_TAIL_DAYS = 10;

async function resolveLocation(options: CliOptions, config: AppConfig): Promise<GeocodedLocation> {
  const { location } = options;
  if (location.kind === 'coordinates') {
    return {
      latitude: location.latitude,
      longitude: location.longitude,
      label: `Manual coordinates: ${location.latitude}, ${location.longitude}`,
    };
  }

  const apiKey = requireOpenCageKey(config);
  if (!options.quiet) console.log('[geocode] Geocoding your place with OpenCage...');
  return geocodePlace(location.name, { apiKey });
}

function exitCodeFor(result: SimulationResult): number {
  switch (result.stopReason) {
    case 'targets_reached':
    case 'horizon_exhausted':
      return 0;
    case 'fetch_failed':
      return 2;
    case 'cancelled':
      return 130;
  }
}

function printReport(result: SimulationResult): void {
  console.log('\nPredicted stages (if reached)');
  formatStageLines(result.stageDates).forEach((line) => console.log(line));

  if (result.records.length > 0) {
    console.log(`\nLast ${HISTORY_TAIL_DAYS} days of GDD history`);
    console.log(formatHistoryTable(result.records, HISTORY_TAIL_DAYS));
  }

  console.log('');
  if (result.completed) {
    console.log(describeOutcome(result));
  } else {
    console.warn(`⚠️  ${describeOutcome(result)}`);
  }
}

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options === null) {
    console.log(USAGE);
    return 0;
  }

  const config = loadAppConfig();
  validateRunSettings(options);

  const location = await resolveLocation(options, config);

  console.log(`📍 Location: ${location.label}`);
  console.log(`   Latitude: ${location.latitude.toFixed(4)}, Longitude: ${location.longitude.toFixed(4)}`);
  console.log(`   Start date: ${options.startDate}`);
  console.log(`   Base temperature: ${options.baseTemperature} °C\n`);

  const simulationConfig = createSimulationConfig({
    latitude: location.latitude,
    longitude: location.longitude,
    startDate: options.startDate,
    baseTemperature: options.baseTemperature,
    targets: options.targets,
    maxHorizonDays: options.maxHorizonDays,
    blockSizeDays: options.blockSizeDays,
  });

  const onProgress = combineProgress(
    options.quiet ? noopProgress : createConsoleProgress({ verbose: options.verbose }),
    createLogProgress(config.logDir)
  );

  const client = createPowerClient({
    baseUrl: config.powerApiUrl,
    maxAttempts: config.powerMaxAttempts,
    timeoutMs: config.powerTimeoutMs,
    retryDelayMs: config.powerRetryDelayMs,
    onProgress,
  });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.warn('\n[gdd] Cancelling after the current block...');
    controller.abort();
  });

  logEvent(
    {
      event: 'simulation_start',
      latitude: simulationConfig.latitude,
      longitude: simulationConfig.longitude,
      startDate: simulationConfig.startDate,
      baseTemperature: simulationConfig.baseTemperature,
      targets: [...simulationConfig.targets],
    },
    config.logDir
  );

  const startedAt = Date.now();
  const result = await runGddSimulation(simulationConfig, { client, onProgress, signal: controller.signal });

  logEvent(
    {
      event: 'simulation_complete',
      stopReason: result.stopReason,
      completed: result.completed,
      days: result.records.length,
      totalGdd: result.totalGdd,
      durationMs: Date.now() - startedAt,
    },
    config.logDir
  );

  printReport(result);

  if (options.csvPath) {
    fs.writeFileSync(options.csvPath, toCsv(result.records));
    console.log(`\n💾 Wrote ${result.records.length} days to ${options.csvPath}`);
  }

  return exitCodeFor(result);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    if (e instanceof ConfigurationError || e instanceof GeocodeError) {
      console.error(`❌ ${e.message}`);
      if (e instanceof ConfigurationError) console.error(`\n${USAGE}`);
    } else {
      console.error('Simulation failed:', e);
      logEvent(
        {
          event: 'error',
          operation: 'run-gdd-simulation',
          error: e instanceof Error ? e.message : String(e),
          stack: e instanceof Error ? e.stack : undefined,
        },
        resolveLogDir()
      );
    }
    process.exitCode = 1;
  });

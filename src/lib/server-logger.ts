/**
 * Server-side logging for simulation runs.
 *
 * Logs to data/logs/gdd.jsonl in JSONL format (one JSON object per line).
 * This enables easy parsing and analysis of past runs and remote failures.
 */

import { appendFileSync, mkdirSync, existsSync } from 'fs';
import { join } from 'path';

export const DEFAULT_LOG_DIR = join(process.cwd(), 'data', 'logs');
export const LOG_FILE_NAME = 'gdd.jsonl';

/**
 * Log event types for simulation runs.
 */
export type LogEvent =
  | {
      event: 'simulation_start';
      latitude: number;
      longitude: number;
      startDate: string;
      baseTemperature: number;
      targets: number[];
    }
  | {
      event: 'block_fetch';
      rangeStart: string;
      rangeEnd: string;
    }
  | {
      event: 'fetch_retry';
      attempt: number;
      maxAttempts: number;
      status?: number;
      reason: string;
    }
  | {
      event: 'simulation_complete';
      stopReason: string;
      completed: boolean;
      days: number;
      totalGdd: number;
      durationMs: number;
    }
  | {
      event: 'error';
      operation: string;
      error: string;
      stack?: string;
    };

/**
 * Append a log event to the log file in `logDir`.
 * Creates the log directory if it doesn't exist.
 */
export function logEvent(event: LogEvent, logDir: string = DEFAULT_LOG_DIR): void {
  try {
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    const entry = { ...event, timestamp: new Date().toISOString() };
    appendFileSync(join(logDir, LOG_FILE_NAME), JSON.stringify(entry) + '\n');
  } catch (e) {
    // Don't let logging failures break a run
    console.error('[server-logger] Failed to write log:', e);
  }
}

/**
 * Progress reporting for simulation runs.
 *
 * The engine and the NASA POWER client never print anything themselves; they
 * call a ProgressSink. The CLI plugs in console and JSONL sinks, tests pass
 * noopProgress or a recorder.
 */

import { logEvent } from './server-logger';

export type ProgressEvent =
  | { kind: 'block'; rangeStart: string; rangeEnd: string; message: string }
  | { kind: 'attempt'; attempt: number; maxAttempts: number; message: string }
  | {
      kind: 'retry';
      attempt: number;
      maxAttempts: number;
      status?: number;
      delayMs: number;
      message: string;
    }
  | { kind: 'fetch_failed'; rangeStart: string; rangeEnd: string; error: string; message: string };

export type ProgressSink = (event: ProgressEvent) => void;

export const noopProgress: ProgressSink = () => {};

/**
 * Print progress to the console with component tags.
 * Per-attempt chatter is only shown when `verbose` is set.
 */
export function createConsoleProgress(options: { verbose?: boolean } = {}): ProgressSink {
  return (event) => {
    switch (event.kind) {
      case 'block':
        console.log(`[gdd] ${event.message}`);
        break;
      case 'attempt':
        if (options.verbose) console.log(`[power] ${event.message}`);
        break;
      case 'retry':
        console.warn(`[power] ${event.message}`);
        break;
      case 'fetch_failed':
        console.error(`[gdd] ${event.message}`);
        break;
    }
  };
}

/**
 * Write block and retry events to the JSONL server log.
 */
export function createLogProgress(logDir?: string): ProgressSink {
  return (event) => {
    switch (event.kind) {
      case 'block':
        logEvent({ event: 'block_fetch', rangeStart: event.rangeStart, rangeEnd: event.rangeEnd }, logDir);
        break;
      case 'retry':
        logEvent(
          {
            event: 'fetch_retry',
            attempt: event.attempt,
            maxAttempts: event.maxAttempts,
            status: event.status,
            reason: event.message,
          },
          logDir
        );
        break;
      case 'fetch_failed':
        logEvent({ event: 'error', operation: 'fetch_block', error: event.error }, logDir);
        break;
      case 'attempt':
        break;
    }
  };
}

/** Fan one event out to several sinks */
export function combineProgress(...sinks: ProgressSink[]): ProgressSink {
  return (event) => {
    for (const sink of sinks) sink(event);
  };
}

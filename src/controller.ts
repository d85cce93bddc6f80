import { validateConfig } from './config.js';
import { BurstDispatcher } from './dispatcher.js';
import { type Logger, silentLogger } from './logger.js';
import { Report } from './report.js';
import type { RunSummary } from './reporter.js';
import type { FetchFn, RunConfig } from './types.js';

export interface RunOptions {
  logger?: Logger;
  fetch?: FetchFn;
  signal?: AbortSignal;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs the dispatcher for `duration + 1` ticks (the extra tick covers the
 * first tick's startup delay), then stops it and waits for in-flight bursts
 * before reading the report.
 */
export async function runLoadTest(config: RunConfig, options: RunOptions = {}): Promise<RunSummary> {
  const cfg = validateConfig(config);
  const logger = options.logger ?? silentLogger;
  const report = new Report();
  const dispatcher = new BurstDispatcher({
    config: cfg,
    report,
    logger,
    tickIntervalMs: cfg.tickIntervalMs,
    fetch: options.fetch,
  });

  logger.info('Waiting for all requests to be executed...');
  const startTime = performance.now();

  const window = sleep((cfg.duration + 1) * cfg.tickIntervalMs, options.signal);
  dispatcher.start(options.signal);
  await window;
  dispatcher.stop();

  if (dispatcher.pending > 0) {
    logger.debug(`waiting for ${dispatcher.pending} in-flight burst(s)`);
  }
  await dispatcher.drain();

  logger.info(options.signal?.aborted ? 'Run interrupted.' : 'Requests executed successfully.');

  return {
    report: report.snapshot(),
    bursts: dispatcher.burstCount,
    duration: performance.now() - startTime,
  };
}

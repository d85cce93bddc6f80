import { OutcomeChannel } from './channel.js';
import { collectErrors, collectResults } from './collector.js';
import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { Report } from './report.js';
import type { BurstConfig, ErrorOutcome, FetchFn, RequestOutcome, SuccessOutcome } from './types.js';
import { sendRequest } from './worker.js';

export const DEFAULT_TICK_INTERVAL_MS = 1000;

export interface DispatcherOptions {
  config: BurstConfig;
  report: Report;
  logger: Logger;
  tickIntervalMs?: number;
  fetch?: FetchFn;
}

export interface BurstResult {
  burst: number;
  outcomes: RequestOutcome[];
  logged: { results: number; errors: number };
}

/**
 * Fires one burst of `requestsPerTick` concurrent requests per tick.
 *
 * Bursts are not serialized against the clock: a slow burst does not delay
 * the next tick, so several bursts may be in flight at once. Each burst gets
 * its own pair of channels.
 */
export class BurstDispatcher {
  private readonly options: DispatcherOptions;
  private readonly tickIntervalMs: number;
  private timer: ReturnType<typeof setInterval> | undefined;
  private signal: AbortSignal | undefined;
  private inFlight = new Set<Promise<void>>();
  private bursts = 0;

  constructor(options: DispatcherOptions) {
    this.options = options;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
  }

  get burstCount(): number {
    return this.bursts;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  get pending(): number {
    return this.inFlight.size;
  }

  start(signal?: AbortSignal): void {
    if (this.timer) {
      throw new Error('dispatcher already started');
    }
    if (signal?.aborted) return;

    this.signal = signal;
    signal?.addEventListener('abort', () => this.stop(), { once: true });
    this.timer = setInterval(() => this.tick(), this.tickIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /** Resolves once every burst started so far has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  async runBurst(burst: number): Promise<BurstResult> {
    const { config, report, logger, fetch } = this.options;
    const results = new OutcomeChannel<SuccessOutcome>();
    const errors = new OutcomeChannel<ErrorOutcome>();

    const collectorOptions = { burst, verbose: config.verbose, logger };
    const collectors = Promise.allSettled([
      collectResults(results, collectorOptions),
      collectErrors(errors, collectorOptions),
    ]);

    const workers: Promise<RequestOutcome>[] = [];
    for (let index = 1; index <= config.requestsPerTick; index++) {
      workers.push(sendRequest(index, {
        config,
        report,
        results,
        errors,
        signal: this.signal,
        fetch,
      }));
    }

    const outcomes = await Promise.all(workers);
    results.close();
    errors.close();

    const [resultsLogged, errorsLogged] = await collectors;
    for (const settled of [resultsLogged, errorsLogged]) {
      if (settled.status === 'rejected') {
        logger.error(`collector for buffer # ${burst} stopped: ${errorMessage(settled.reason)}`);
      }
    }

    return {
      burst,
      outcomes,
      logged: {
        results: resultsLogged.status === 'fulfilled' ? resultsLogged.value : 0,
        errors: errorsLogged.status === 'fulfilled' ? errorsLogged.value : 0,
      },
    };
  }

  private tick(): void {
    if (this.signal?.aborted) {
      this.stop();
      return;
    }

    const burst = ++this.bursts;
    const task: Promise<void> = this.runBurst(burst)
      .then(
        () => undefined,
        (error: unknown) => {
          this.options.logger.error(`buffer # ${burst} failed: ${errorMessage(error)}`);
        }
      )
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }
}

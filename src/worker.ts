import type { OutcomeChannel } from './channel.js';
import { TransportError } from './errors.js';
import type { Report } from './report.js';
import { ACCEPTED_STATUSES } from './types.js';
import type {
  BurstConfig,
  ErrorOutcome,
  FetchFn,
  RequestOutcome,
  RequestPayload,
  SuccessOutcome,
} from './types.js';

export interface WorkerContext {
  config: Pick<BurstConfig, 'url' | 'apiKey' | 'timeoutMs'>;
  report: Report;
  results: OutcomeChannel<SuccessOutcome>;
  errors: OutcomeChannel<ErrorOutcome>;
  signal?: AbortSignal;
  fetch?: FetchFn;
  now?: () => Date;
}

export function buildPayload(index: number, date: Date): RequestPayload {
  return {
    name: `request #${index}`,
    date: date.toISOString(),
    requests_sent: index,
  };
}

export function classify(index: number, response: Response): SuccessOutcome | ErrorOutcome {
  if (ACCEPTED_STATUSES.has(response.status)) {
    return { kind: 'success', index, response };
  }
  return { kind: 'rejected', index, response };
}

function requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const deadline = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, deadline]) : deadline;
}

/**
 * Performs a single POST attempt. Never throws: a transport failure becomes a
 * `transport` outcome. The outcome is counted once and published on exactly
 * one of the two channels.
 */
export async function sendRequest(index: number, ctx: WorkerContext): Promise<RequestOutcome> {
  const fetchFn: FetchFn = ctx.fetch ?? globalThis.fetch;
  const now = ctx.now ?? (() => new Date());
  const { url, apiKey, timeoutMs } = ctx.config;

  let outcome: RequestOutcome;
  try {
    const response = await fetchFn(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json; charset=UTF-8',
        'X-Api-Key': apiKey,
      },
      body: JSON.stringify(buildPayload(index, now())),
      signal: requestSignal(timeoutMs, ctx.signal),
    });
    outcome = classify(index, response);
  } catch (error) {
    outcome = { kind: 'transport', index, error: TransportError.from(error, timeoutMs) };
  }

  ctx.report.record(outcome);
  if (outcome.kind === 'success') {
    ctx.results.send(outcome);
  } else {
    ctx.errors.send(outcome);
  }
  return outcome;
}

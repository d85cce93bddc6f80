import type { TransportError } from './errors.js';

export type OutputFormat = 'json' | 'pretty';

export const ACCEPTED_STATUSES: ReadonlySet<number> = new Set([200, 201, 202, 204]);

export interface SuccessOutcome {
  kind: 'success';
  index: number;
  response: Response;
}

// A response arrived but its status is outside ACCEPTED_STATUSES.
export interface RejectedOutcome {
  kind: 'rejected';
  index: number;
  response: Response;
}

export interface TransportOutcome {
  kind: 'transport';
  index: number;
  error: TransportError;
}

export type RequestOutcome = SuccessOutcome | RejectedOutcome | TransportOutcome;

export type ErrorOutcome = RejectedOutcome | TransportOutcome;

export interface ReportSnapshot {
  TotalRequests: number;
  TotalSuccess: number;
  TotalFail: number;
}

export interface BurstConfig {
  url: string;
  apiKey: string;
  requestsPerTick: number;
  verbose: boolean;
  timeoutMs: number;
}

export interface RunConfig extends BurstConfig {
  duration: number;
  tickIntervalMs: number;
  output: OutputFormat;
}

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface RequestPayload {
  name: string;
  date: string;
  requests_sent: number;
}

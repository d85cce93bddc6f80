import type { RequestOutcome, ReportSnapshot } from './types.js';

/**
 * Run-wide counters. Workers never touch the fields directly; every attempt
 * goes through `record`, which runs synchronously on the event loop and so
 * cannot interleave with another attempt's update.
 */
export class Report {
  private totalRequests = 0;
  private totalSuccess = 0;
  private totalFail = 0;

  record(outcome: RequestOutcome): void {
    this.totalRequests++;
    if (outcome.kind === 'success') {
      this.totalSuccess++;
    } else {
      this.totalFail++;
    }
  }

  snapshot(): ReportSnapshot {
    return Object.freeze({
      TotalRequests: this.totalRequests,
      TotalSuccess: this.totalSuccess,
      TotalFail: this.totalFail,
    });
  }

  toJSON(): ReportSnapshot {
    return this.snapshot();
  }
}

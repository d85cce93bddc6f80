/**
 * Unit Tests: Report counters and JSON rendering.
 */
import { describe, it, expect } from 'vitest';
import { TransportError } from '../../src/errors.js';
import { Report } from '../../src/report.js';
import { mockEmptyResponse, mockJsonResponse } from '../helpers/mock-fetch.js';

describe('Report', () => {
  it('starts at zero', () => {
    expect(new Report().snapshot()).toEqual({ TotalRequests: 0, TotalSuccess: 0, TotalFail: 0 });
  });

  it('counts a success once', () => {
    const report = new Report();
    report.record({ kind: 'success', index: 1, response: mockEmptyResponse(204) });
    expect(report.snapshot()).toEqual({ TotalRequests: 1, TotalSuccess: 1, TotalFail: 0 });
  });

  it('counts a rejected status as a single failure', () => {
    const report = new Report();
    report.record({ kind: 'rejected', index: 1, response: mockJsonResponse({}, 500) });
    expect(report.snapshot()).toEqual({ TotalRequests: 1, TotalSuccess: 0, TotalFail: 1 });
  });

  it('counts a transport error as a single failure', () => {
    const report = new Report();
    report.record({ kind: 'transport', index: 1, error: new TransportError('fetch failed') });
    expect(report.snapshot()).toEqual({ TotalRequests: 1, TotalSuccess: 0, TotalFail: 1 });
  });

  it('keeps success + fail equal to total', () => {
    const report = new Report();
    for (let i = 1; i <= 4; i++) {
      report.record({ kind: 'success', index: i, response: mockEmptyResponse(204) });
    }
    report.record({ kind: 'rejected', index: 5, response: mockJsonResponse({}, 404) });
    report.record({ kind: 'transport', index: 6, error: new TransportError('request aborted') });

    const snapshot = report.snapshot();
    expect(snapshot).toEqual({ TotalRequests: 6, TotalSuccess: 4, TotalFail: 2 });
    expect(snapshot.TotalSuccess + snapshot.TotalFail).toBe(snapshot.TotalRequests);
  });

  it('returns a frozen snapshot unaffected by later records', () => {
    const report = new Report();
    const before = report.snapshot();
    report.record({ kind: 'success', index: 1, response: mockEmptyResponse(204) });

    expect(Object.isFrozen(before)).toBe(true);
    expect(before.TotalRequests).toBe(0);
  });

  it('serializes with the report keys', () => {
    const report = new Report();
    report.record({ kind: 'success', index: 1, response: mockEmptyResponse(204) });
    expect(JSON.stringify(report)).toBe('{"TotalRequests":1,"TotalSuccess":1,"TotalFail":0}');
  });
});

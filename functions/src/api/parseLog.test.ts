/**
 * Parse Log Endpoint Tests
 *
 * Drives handleParseLog with Express-like mocks and a fake token verifier.
 */

import {describe, it, expect, vi, beforeEach} from 'vitest';
import {
  createMockRequest,
  createMockResponse,
  createMockVerifier,
  encodeLog,
  TEST_UID,
} from '../../tests/mocks/http';
import type {SetLogConfig} from '../config';
import {NameStandardizer} from '../services/setlog';
import {handleParseLog} from './parseLog';
import type {ParseLogDeps} from './parseLog';

// ============================================================================
// Test Data
// ============================================================================

const CONFIG: SetLogConfig = {
  weightUnit: 'kg',
  onLineError: 'skip',
  tsvDecimalSeparator: ',',
};

const LOG = ['2025-01-01', 'bp 75k: 4, 3x5', 'Squat 3x', '', '2025-01-03', 'dl 140k'].join('\n');

const BENCH_JSON = {
  name: 'Bench Press',
  sets: [
    {repetitions: 4, weight: {amount: 75, unit: 'kg'}},
    {repetitions: 5, weight: {amount: 75, unit: 'kg'}},
    {repetitions: 5, weight: {amount: 75, unit: 'kg'}},
    {repetitions: 5, weight: {amount: 75, unit: 'kg'}},
  ],
};

const DEADLIFT_JSON = {name: 'Deadlift', sets: [{repetitions: 1, weight: {amount: 140, unit: 'kg'}}]};

const SQUAT_REJECTED = {
  lineNumber: 3,
  source: 'Squat 3x',
  error: {name: 'SetLogSyntaxError', message: 'Expected a number (column 9)'},
};

function createDeps(overrides: Partial<ParseLogDeps> = {}): ParseLogDeps {
  return {
    verifier: createMockVerifier(),
    config: CONFIG,
    standardizer: new NameStandardizer(),
    ...overrides,
  };
}

describe('handleParseLog', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  describe('request validation', () => {
    it('rejects non-POST requests', async () => {
      const res = createMockResponse();

      await handleParseLog(createMockRequest({method: 'GET'}), res, createDeps());

      expect(res.status).toHaveBeenCalledWith(405);
      expect(res._jsonData).toEqual({error: 'Method not allowed'});
    });

    it('rejects a request without a token before reading the body', async () => {
      const deps = createDeps();
      const res = createMockResponse();

      await handleParseLog(createMockRequest({headers: {}, body: {logData: encodeLog(LOG)}}), res, deps);

      expect(res._statusCode).toBe(401);
      expect(res._jsonData).toEqual({error: 'Missing Authorization header'});
    });

    it('rejects an invalid token', async () => {
      const res = createMockResponse();

      await handleParseLog(
        createMockRequest({headers: {authorization: 'Bearer forged-token'}, body: {logData: encodeLog(LOG)}}),
        res,
        createDeps()
      );

      expect(res._statusCode).toBe(401);
      expect(res._jsonData).toEqual({error: 'Invalid token'});
    });

    it.each([
      ['a non-object body', 'Squat 3x5', 'Request body must be a JSON object'],
      ['a missing logData', {}, 'logData is required (base64 encoded)'],
      ['a non-base64 logData', {logData: 'Squat 3x5!'}, 'logData must be base64 encoded'],
      ['an unknown mode', {logData: encodeLog(LOG), mode: 'weeks'}, 'mode must be "exercises" or "sessions"'],
    ])('returns 400 for %s', async (_label, body, message) => {
      const res = createMockResponse();

      await handleParseLog(createMockRequest({body}), res, createDeps());

      expect(res._statusCode).toBe(400);
      expect(res._jsonData).toEqual({error: message});
    });
  });

  describe('parsing', () => {
    it('returns exercises and rejected lines by default', async () => {
      const res = createMockResponse();

      await handleParseLog(createMockRequest({body: {logData: encodeLog(LOG)}}), res, createDeps());

      expect(res.status).not.toHaveBeenCalled();
      expect(res._jsonData).toEqual({
        success: true,
        exercises: [BENCH_JSON, DEADLIFT_JSON],
        rejected: [SQUAT_REJECTED],
      });
      expect(console.log).toHaveBeenCalledWith(`Parsed log for ${TEST_UID}: 1 rejected lines`);
    });

    it('returns dated sessions in sessions mode', async () => {
      const res = createMockResponse();

      await handleParseLog(
        createMockRequest({body: {logData: encodeLog(LOG), mode: 'sessions'}}),
        res,
        createDeps()
      );

      expect(res._jsonData).toEqual({
        success: true,
        sessions: [
          {date: '2025-01-01', notes: '', exercises: [BENCH_JSON]},
          {date: '2025-01-03', notes: '', exercises: [DEADLIFT_JSON]},
        ],
        rejected: [SQUAT_REJECTED],
      });
    });

    it('returns 422 with the line number under the abort policy', async () => {
      const res = createMockResponse();

      await handleParseLog(
        createMockRequest({body: {logData: encodeLog(LOG)}}),
        res,
        createDeps({config: {...CONFIG, onLineError: 'abort'}})
      );

      expect(res._statusCode).toBe(422);
      expect(res._jsonData).toEqual({error: 'Line 3: Expected a number (column 9)', lineNumber: 3});
    });

    it('propagates unexpected failures to the caller', async () => {
      class FailingStandardizer extends NameStandardizer {
        standardize(): string {
          throw new Error('lookup failed');
        }
      }

      await expect(
        handleParseLog(
          createMockRequest({body: {logData: encodeLog('Squat 3x5')}}),
          createMockResponse(),
          createDeps({standardizer: new FailingStandardizer()})
        )
      ).rejects.toThrow('lookup failed');
    });
  });
});

/**
 * Parse endpoint - workout log text to exercise records
 *
 * POST /api/parseLog
 * Requires: Authorization header with Firebase ID token
 *
 * Request body:
 * {
 *   logData: string,                  // Base64-encoded log text
 *   mode?: "exercises" | "sessions"   // Default: "exercises"
 * }
 *
 * Response:
 * {
 *   success: true,
 *   exercises?: ExerciseJson[],       // mode "exercises"
 *   sessions?: SessionJson[],         // mode "sessions"
 *   rejected: RejectedLine[]
 * }
 */

import {onRequest} from 'firebase-functions/v2/https';
import type * as AdminType from 'firebase-admin';
import type {ExerciseJson, RejectedLine, SessionJson} from '../../../shared/types';
import {AuthError, verifyAuth} from '../auth';
import type {AuthorizedRequest, TokenVerifier} from '../auth';
import {loadConfig} from '../config';
import type {SetLogConfig} from '../config';
import {serializeSessions, toExerciseJson} from '../export/serializers';
import {LogLineError, parseWorkoutLog, parseWorkoutSessions} from '../services/setlog';
import type {NameStandardizer} from '../services/setlog';
import {configureStandardizer} from '../synonyms';

// Lazy-loaded admin module
let adminModule: typeof AdminType | null = null;

function getAdmin(): typeof AdminType {
  if (!adminModule) {
    // eslint-disable-next-line @typescript-eslint/no-var-requires
    const loaded: typeof AdminType = require('firebase-admin');
    if (loaded.apps.length === 0) {
      loaded.initializeApp();
    }
    adminModule = loaded;
  }
  return adminModule;
}

// ============================================================================
// Types
// ============================================================================

type ParseMode = 'exercises' | 'sessions';

export interface ParseLogRequest extends AuthorizedRequest {
  method: string;
  body: unknown;
}

export interface ParseLogResponse {
  status(code: number): ParseLogResponse;
  json(body: unknown): unknown;
}

export interface ParseLogResult {
  success: true;
  exercises?: ExerciseJson[];
  sessions?: SessionJson[];
  rejected: RejectedLine[];
}

export interface ParseLogDeps {
  verifier: TokenVerifier;
  config: SetLogConfig;
  standardizer: NameStandardizer;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/\s]*={0,2}\s*$/;

function isParseMode(value: unknown): value is ParseMode {
  return value === 'exercises' || value === 'sessions';
}

// ============================================================================
// Request Parsing
// ============================================================================

function readBody(body: unknown): {logText: string; mode: ParseMode} | {error: string} {
  if (typeof body !== 'object' || body === null) {
    return {error: 'Request body must be a JSON object'};
  }

  const logData = 'logData' in body ? body.logData : undefined;
  if (typeof logData !== 'string' || logData.trim().length === 0) {
    return {error: 'logData is required (base64 encoded)'};
  }
  if (!BASE64_PATTERN.test(logData)) {
    return {error: 'logData must be base64 encoded'};
  }

  const mode = 'mode' in body && body.mode !== undefined ? body.mode : 'exercises';
  if (!isParseMode(mode)) {
    return {error: 'mode must be "exercises" or "sessions"'};
  }

  return {logText: Buffer.from(logData, 'base64').toString('utf-8'), mode};
}

// ============================================================================
// Handler
// ============================================================================

export async function handleParseLog(
  req: ParseLogRequest,
  res: ParseLogResponse,
  deps: ParseLogDeps
): Promise<void> {
  if (req.method !== 'POST') {
    res.status(405).json({error: 'Method not allowed'});
    return;
  }

  let uid: string;
  try {
    uid = await verifyAuth(req, deps.verifier);
  } catch (error) {
    if (error instanceof AuthError) {
      res.status(error.statusCode).json({error: error.message});
      return;
    }
    throw error;
  }

  const parsed = readBody(req.body);
  if ('error' in parsed) {
    res.status(400).json({error: parsed.error});
    return;
  }

  const options = {
    unit: deps.config.weightUnit,
    standardizer: deps.standardizer,
    onLineError: deps.config.onLineError,
  };

  try {
    let result: ParseLogResult;
    if (parsed.mode === 'sessions') {
      const sessions = parseWorkoutSessions(parsed.logText, options);
      result = {
        success: true,
        sessions: serializeSessions(sessions),
        rejected: sessions.flatMap((session) => session.rejected),
      };
    } else {
      const log = parseWorkoutLog(parsed.logText, options);
      result = {
        success: true,
        exercises: log.exercises.map(toExerciseJson),
        rejected: log.rejected,
      };
    }

    console.log(`Parsed log for ${uid}: ${result.rejected.length} rejected lines`);
    res.json(result);
  } catch (error) {
    if (error instanceof LogLineError) {
      res.status(422).json({error: error.message, lineNumber: error.lineNumber});
      return;
    }
    throw error;
  }
}

export const parseLog = onRequest(
  {cors: true, invoker: 'public', timeoutSeconds: 60},
  async (req, res) => {
    try {
      const config = loadConfig();
      await handleParseLog(req, res, {
        verifier: getAdmin().auth(),
        config,
        standardizer: configureStandardizer(config),
      });
    } catch (error) {
      console.error('Parse error:', error);
      const errorMessage = error instanceof Error ? error.message : 'Parse failed';
      res.status(500).json({error: errorMessage});
    }
  }
);

/**
 * Workout Log Reader
 *
 * Reads whole log documents. Two layouts are supported:
 *
 * Single session - exercise lines, with date lines and "#" notes ignored:
 *   2025-01-01
 *   Bench press 75k: 4, 3x5
 *   Squat 3x10x70k
 *
 * Multi session - blank lines separate sessions, the first line of each is
 * its date, "#" lines are its notes:
 *   2025-01-01
 *   # felt strong
 *   Bench press 75k: 4, 3x5
 *
 *   2025-01-03
 *   Squat 3x10x70k
 */

import type {
  LineErrorPolicy,
  RawWorkoutSession,
  RejectedLine,
  WeightUnit,
  WorkoutLogResult,
  WorkoutSession,
} from '../../../../shared/types';
import { DATE_LINE_PATTERN, DEFAULT_WEIGHT_UNIT, NOTE_LINE_PREFIX } from '../../../../shared/constants';
import { isLineError, LogLineError } from './errors';
import { parseExerciseLine } from './LineParser';
import { getDefaultStandardizer, NameStandardizer } from './NameStandardizer';
import { assembleExerciseRecord } from './RecordAssembler';

export interface ReadLogOptions {
  unit?: WeightUnit;
  standardizer?: NameStandardizer;
  onLineError?: LineErrorPolicy;
}

interface NumberedLine {
  lineNumber: number;
  text: string;
}

export function splitLines(text: string): NumberedLine[] {
  return text.split(/\r?\n/).map((line, index) => ({ lineNumber: index + 1, text: line.trimEnd() }));
}

/**
 * Parse a single-session log, skipping blank, date and note lines
 */
export function parseWorkoutLog(text: string, options: ReadLogOptions = {}): WorkoutLogResult {
  const lines = splitLines(text).filter((line) => {
    const trimmed = line.text.trim();
    return (
      trimmed.length > 0 &&
      !DATE_LINE_PATTERN.test(trimmed) &&
      !trimmed.startsWith(NOTE_LINE_PREFIX)
    );
  });

  return parseLines(lines, options);
}

/**
 * Group log lines into dated sessions. A blank line closes a session.
 */
export function groupSessions(lines: NumberedLine[]): RawWorkoutSession[] {
  const sessions: RawWorkoutSession[] = [];
  let date: string | null = null;
  let notes: string[] = [];
  let payload: NumberedLine[] = [];

  const flush = () => {
    if (date !== null) {
      sessions.push({ date, notes: notes.join('\n'), payload });
    }
    date = null;
    notes = [];
    payload = [];
  };

  for (const line of lines) {
    const trimmed = line.text.trim();

    if (trimmed.length === 0) {
      flush();
      continue;
    }

    if (trimmed.startsWith(NOTE_LINE_PREFIX)) {
      notes.push(trimmed);
      continue;
    }

    if (date === null) {
      date = trimmed;
      continue;
    }

    payload.push({ lineNumber: line.lineNumber, text: trimmed });
  }

  flush();
  return sessions;
}

/**
 * Parse a multi-session log
 */
export function parseWorkoutSessions(text: string, options: ReadLogOptions = {}): WorkoutSession[] {
  return groupSessions(splitLines(text)).map((session) => ({
    date: session.date,
    notes: session.notes,
    ...parseLines(session.payload, options),
  }));
}

function parseLines(lines: NumberedLine[], options: ReadLogOptions): WorkoutLogResult {
  const unit = options.unit ?? DEFAULT_WEIGHT_UNIT;
  const standardizer = options.standardizer ?? getDefaultStandardizer();
  const onLineError = options.onLineError ?? 'skip';

  const result: WorkoutLogResult = { exercises: [], rejected: [] };

  for (const line of lines) {
    const source = line.text.trim();
    try {
      const parsed = parseExerciseLine(source, { unit, lineNumber: line.lineNumber });
      result.exercises.push(assembleExerciseRecord(parsed, standardizer, { unit }));
    } catch (error) {
      if (!isLineError(error)) {
        throw error;
      }
      if (onLineError === 'abort') {
        throw new LogLineError(line.lineNumber, source, error);
      }
      result.rejected.push(toRejectedLine(line.lineNumber, source, error));
    }
  }

  return result;
}

function toRejectedLine(lineNumber: number, source: string, error: Error): RejectedLine {
  return {
    lineNumber,
    source,
    error: { name: error.name, message: error.message },
  };
}

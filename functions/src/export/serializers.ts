/**
 * Export serializers
 *
 * JSON shapes for exercise records and sessions, the set-centric workout
 * document, and the row-per-group TSV table.
 */

import type {
  ExerciseJson,
  ExerciseRecord,
  SessionJson,
  SetCentricDocument,
  WorkoutSession,
} from '../../../shared/types';
import {
  DEFAULT_EQUIPMENT,
  DEFAULT_TSV_DECIMAL_SEPARATOR,
  TSV_HEADER,
} from '../../../shared/constants';

// ============================================================================
// JSON
// ============================================================================

export function toExerciseJson(record: ExerciseRecord): ExerciseJson {
  return {
    name: record.name,
    sets: record.sets.map((set) => ({
      repetitions: set.repetitions,
      weight: { amount: set.weight.amount, unit: set.weight.unit },
    })),
  };
}

/**
 * "w_20240115_103000" for 2024-01-15T10:30:00Z
 */
export function buildWorkoutId(timestamp: Date): string {
  const iso = timestamp.toISOString();
  const date = iso.slice(0, 10).replace(/-/g, '');
  const time = iso.slice(11, 19).replace(/:/g, '');
  return `w_${date}_${time}`;
}

export function serializeToSetCentric(
  records: ExerciseRecord[],
  timestamp: Date = new Date()
): SetCentricDocument {
  return {
    workout_id: buildWorkoutId(timestamp),
    type: 'set-centric',
    date: timestamp.toISOString(),
    location: '',
    notes: '',
    statistics: {},
    exercises: records.map((record) => ({
      name: record.name,
      equipment: DEFAULT_EQUIPMENT,
      sets: record.sets.map((set, index) => ({
        setNumber: index + 1,
        repetitions: set.repetitions,
        weight: { amount: set.weight.amount, unit: set.weight.unit },
      })),
    })),
  };
}

export function serializeSessions(sessions: WorkoutSession[]): SessionJson[] {
  return sessions.map((session) => ({
    date: session.date,
    notes: session.notes,
    exercises: session.exercises.map(toExerciseJson),
  }));
}

// ============================================================================
// TSV
// ============================================================================

export interface TsvOptions {
  decimalSeparator?: string;
}

interface SetGroup {
  count: number;
  repetitions: number;
  amount: number;
}

/**
 * Consecutive sets with the same repetitions and weight form one group
 */
export function groupConsecutiveSets(record: ExerciseRecord): SetGroup[] {
  const groups: SetGroup[] = [];

  for (const set of record.sets) {
    const last = groups[groups.length - 1];
    if (last && last.repetitions === set.repetitions && last.amount === set.weight.amount) {
      last.count++;
    } else {
      groups.push({ count: 1, repetitions: set.repetitions, amount: set.weight.amount });
    }
  }

  return groups;
}

export function toTsvRows(sessions: WorkoutSession[], options: TsvOptions = {}): string[][] {
  const separator = options.decimalSeparator ?? DEFAULT_TSV_DECIMAL_SEPARATOR;
  const rows: string[][] = [[...TSV_HEADER]];

  for (const session of sessions) {
    for (const record of session.exercises) {
      for (const group of groupConsecutiveSets(record)) {
        rows.push([
          session.date,
          record.name,
          group.count.toString(),
          group.repetitions.toString(),
          group.amount.toFixed(1).replace('.', separator),
        ]);
      }
    }
  }

  return rows;
}

export function formatTsv(rows: string[][]): string {
  return rows.map((row) => row.map(escapeTsvField).join('\t')).join('\n');
}

function escapeTsvField(value: string): string {
  if (value.includes('\t') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

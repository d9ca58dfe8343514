/**
 * Weight, SetEntry and ExerciseRecord helpers
 */

import type { ExerciseRecord, SetEntry, Weight, WeightUnit } from '../../../../shared/types';
import { DEFAULT_WEIGHT_UNIT } from '../../../../shared/constants';
import { NumericRangeError } from './errors';

export function createWeight(amount: number, unit: WeightUnit = DEFAULT_WEIGHT_UNIT): Weight {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new NumericRangeError(`Weight must be a non-negative number, got ${amount}`, amount);
  }
  return { amount, unit };
}

export function zeroWeight(unit: WeightUnit = DEFAULT_WEIGHT_UNIT): Weight {
  return { amount: 0, unit };
}

export function createExerciseRecord(name: string, sets: SetEntry[]): ExerciseRecord {
  const frozenSets = sets.map((set) =>
    Object.freeze({
      repetitions: set.repetitions,
      weight: Object.freeze({ ...set.weight }),
    })
  );
  return Object.freeze({ name, sets: Object.freeze(frozenSets) });
}

/**
 * "Bench Press: 4 - 10kg, 5 - 10kg"
 */
export function formatExerciseRecord(record: ExerciseRecord): string {
  const sets = record.sets
    .map((set) => `${set.repetitions} - ${set.weight.amount}${set.weight.unit}`)
    .join(', ');
  return `${record.name}: ${sets}`;
}

export function recordVolume(record: ExerciseRecord): number {
  return record.sets.reduce((sum, set) => sum + set.repetitions * set.weight.amount, 0);
}

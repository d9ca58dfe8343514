/**
 * Exercise Record Assembly
 *
 * Standardizes the name of a parsed line and evaluates its set tree with no
 * ambient weight.
 */

import type { ExerciseRecord, ParsedExerciseLine, WeightUnit } from '../../../../shared/types';
import { MalformedSetError } from './errors';
import { createExerciseRecord } from './model';
import type { NameStandardizer } from './NameStandardizer';
import { evaluateSetExpression } from './SetEvaluator';

export interface AssembleOptions {
  unit?: WeightUnit;
}

/**
 * @throws MalformedSetError when the line documents no set
 */
export function assembleExerciseRecord(
  line: Pick<ParsedExerciseLine, 'name' | 'root'>,
  standardizer: NameStandardizer,
  options: AssembleOptions = {}
): ExerciseRecord {
  const name = standardizer.standardize(line.name);
  const sets = evaluateSetExpression(line.root, undefined, { unit: options.unit });

  if (sets.length === 0) {
    throw new MalformedSetError(`"${name}" has no sets`);
  }

  return createExerciseRecord(name, sets);
}

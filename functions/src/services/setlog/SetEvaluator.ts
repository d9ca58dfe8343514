/**
 * Set Expression Evaluator
 *
 * Flattens the syntax tree of one exercise line into its ordered list of
 * concrete sets. The tree already encodes precedence: wholeSet and
 * fixedRepsMultiWeight are always leaves, only weightScoped and combine
 * carry subtrees.
 *
 * Ambient weight is passed down explicitly. A node without its own weight
 * takes the nearest enclosing weightScoped weight, or a zero-amount weight
 * when there is none.
 */

import type { SetEntry, SetExpressionNode, Weight, WeightUnit } from '../../../../shared/types';
import { DEFAULT_WEIGHT_UNIT, MAX_REPETITIONS, MAX_SET_COUNT } from '../../../../shared/constants';
import { MalformedSetError, NumericRangeError } from './errors';
import { createWeight, zeroWeight } from './model';

export interface EvaluateOptions {
  /** Unit every weight must carry, and the unit of the zero weight */
  unit?: WeightUnit;
}

/**
 * Evaluate a set expression
 *
 * @param node - Root of the expression tree
 * @param ambientWeight - Weight inherited from an enclosing scope, if any
 * @returns Sets in the order they were written
 * @throws MalformedSetError on zero counts or a weight in another unit
 * @throws NumericRangeError on negative, fractional or out-of-bound literals
 */
export function evaluateSetExpression(
  node: SetExpressionNode,
  ambientWeight?: Weight,
  options: EvaluateOptions = {}
): SetEntry[] {
  const unit = options.unit ?? DEFAULT_WEIGHT_UNIT;
  const result: SetEntry[] = [];
  collect(node, ambientWeight && checkWeight(ambientWeight, unit), unit, result);
  return result;
}

function collect(
  node: SetExpressionNode,
  ambientWeight: Weight | undefined,
  unit: WeightUnit,
  out: SetEntry[]
): void {
  switch (node.kind) {
    case 'bareCount': {
      const repetitions = checkRepetitions(node.repetitions);
      out.push(entry(repetitions, ambientWeight ?? zeroWeight(unit)));
      return;
    }

    case 'countByCount': {
      const sets = checkSetCount(node.sets);
      const repetitions = checkRepetitions(node.repetitions);
      const weight = ambientWeight ?? zeroWeight(unit);
      for (let i = 0; i < sets; i++) {
        out.push(entry(repetitions, weight));
      }
      return;
    }

    case 'wholeSet': {
      const sets = checkSetCount(node.sets);
      const repetitions = checkRepetitions(node.repetitions);
      const weight = checkWeight(node.weight, unit);
      for (let i = 0; i < sets; i++) {
        out.push(entry(repetitions, weight));
      }
      return;
    }

    case 'weightScoped': {
      const weight = checkWeight(node.weight, unit);
      if (!node.inner) {
        // A weight mentioned with no notation documents one set of one rep
        out.push(entry(1, weight));
        return;
      }
      collect(node.inner, weight, unit, out);
      return;
    }

    case 'fixedRepsMultiWeight': {
      const repetitions = checkRepetitions(node.repetitions);
      for (const weight of node.weights) {
        out.push(entry(repetitions, checkWeight(weight, unit)));
      }
      return;
    }

    case 'combine':
      collect(node.left, ambientWeight, unit, out);
      collect(node.right, ambientWeight, unit, out);
      return;

    default:
      return assertNever(node);
  }
}

function entry(repetitions: number, weight: Weight): SetEntry {
  return { repetitions, weight: { ...weight } };
}

function checkCount(value: number, label: string, max: number): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new NumericRangeError(`${label} must be a non-negative integer, got ${value}`, value);
  }
  if (value > max) {
    throw new NumericRangeError(`${label} ${value} exceeds the maximum of ${max}`, value);
  }
  if (value === 0) {
    throw new MalformedSetError(`${label} must be at least 1`);
  }
  return value;
}

function checkRepetitions(value: number): number {
  return checkCount(value, 'Repetitions', MAX_REPETITIONS);
}

function checkSetCount(value: number): number {
  return checkCount(value, 'Set count', MAX_SET_COUNT);
}

function checkWeight(weight: Weight, unit: WeightUnit): Weight {
  if (weight.unit !== unit) {
    throw new MalformedSetError(`Weight in ${weight.unit} where ${unit} is expected`);
  }
  return createWeight(weight.amount, weight.unit);
}

function assertNever(node: never): never {
  throw new Error(`Unknown set expression node: ${JSON.stringify(node)}`);
}

/**
 * Set-Log Service Layer
 *
 * Unified export for parsing workout logs into exercise records.
 *
 * Services:
 * - LineParser: Exercise line text -> name + set expression tree
 * - SetEvaluator: Set expression tree -> ordered sets
 * - NameStandardizer: Free-text exercise name -> canonical name
 * - RecordAssembler: Parsed line -> immutable exercise record
 * - LogReader: Whole documents, single or multi session
 */

// Errors
export * from './errors';

// Model helpers
export {
  createWeight,
  zeroWeight,
  createExerciseRecord,
  formatExerciseRecord,
  recordVolume,
} from './model';

// Parsing
export { tokenize, parseExerciseLine } from './LineParser';
export type { LineParserOptions } from './LineParser';

// Evaluation
export { evaluateSetExpression } from './SetEvaluator';
export type { EvaluateOptions } from './SetEvaluator';

// Names
export {
  NameStandardizer,
  normalizeWhitespace,
  matchKey,
  getDefaultStandardizer,
  resetDefaultStandardizer,
} from './NameStandardizer';

// Records
export { assembleExerciseRecord } from './RecordAssembler';
export type { AssembleOptions } from './RecordAssembler';

// Documents
export {
  splitLines,
  parseWorkoutLog,
  groupSessions,
  parseWorkoutSessions,
} from './LogReader';
export type { ReadLogOptions } from './LogReader';

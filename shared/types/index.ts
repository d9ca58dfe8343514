/**
 * Set-Log Shared Types
 *
 * Data shapes shared by the parser, the exporters, the CLI and the
 * HTTP endpoint.
 */

// ============================================================================
// Weight & Sets
// ============================================================================

export type WeightUnit = 'kg' | 'lb';

export interface Weight {
  amount: number;
  unit: WeightUnit;
}

export interface SetEntry {
  repetitions: number;
  weight: Weight;
}

/**
 * One exercise line after evaluation and name standardization.
 * Frozen on construction.
 */
export interface ExerciseRecord {
  readonly name: string;
  readonly sets: readonly Readonly<SetEntry>[];
}

// ============================================================================
// Set Expression Tree
// ============================================================================

export type SetExpressionNode =
  | BareCountNode
  | CountByCountNode
  | WholeSetNode
  | WeightScopedNode
  | FixedRepsMultiWeightNode
  | CombineNode;

export interface BareCountNode {
  kind: 'bareCount';
  repetitions: number;
}

export interface CountByCountNode {
  kind: 'countByCount';
  sets: number;
  repetitions: number;
}

export interface WholeSetNode {
  kind: 'wholeSet';
  sets: number;
  repetitions: number;
  weight: Weight;
}

export interface WeightScopedNode {
  kind: 'weightScoped';
  weight: Weight;
  inner?: SetExpressionNode;
}

export interface FixedRepsMultiWeightNode {
  kind: 'fixedRepsMultiWeight';
  repetitions: number;
  weights: Weight[];
}

export interface CombineNode {
  kind: 'combine';
  left: SetExpressionNode;
  right: SetExpressionNode;
}

export interface ParsedExerciseLine {
  name: string;
  root: SetExpressionNode;
  lineNumber: number;
  source: string;
}

// ============================================================================
// Synonyms
// ============================================================================

export interface SynonymEntry {
  canonical: string;
  synonyms: string[];
}

// ============================================================================
// Documents
// ============================================================================

export type LineErrorPolicy = 'skip' | 'abort';

export interface RejectedLine {
  lineNumber: number;
  source: string;
  error: {
    name: string;
    message: string;
  };
}

export interface WorkoutLogResult {
  exercises: ExerciseRecord[];
  rejected: RejectedLine[];
}

export interface RawWorkoutSession {
  date: string;
  notes: string;
  payload: Array<{ lineNumber: number; text: string }>;
}

export interface WorkoutSession extends WorkoutLogResult {
  date: string;
  notes: string;
}

// ============================================================================
// Export Formats
// ============================================================================

export interface ExerciseJson {
  name: string;
  sets: SetEntry[];
}

export interface SetCentricSet extends SetEntry {
  setNumber: number;
}

export interface SetCentricExercise {
  name: string;
  equipment: 'other';
  sets: SetCentricSet[];
}

export interface SetCentricDocument {
  workout_id: string;
  type: 'set-centric';
  date: string;
  location: string;
  notes: string;
  statistics: Record<string, never>;
  exercises: SetCentricExercise[];
}

export interface SessionJson {
  date: string;
  notes: string;
  exercises: ExerciseJson[];
}

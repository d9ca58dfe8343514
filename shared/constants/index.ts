/**
 * Set-Log Shared Constants
 */

import type { WeightUnit } from '../types';

// ============================================================================
// Units
// ============================================================================

export const DEFAULT_WEIGHT_UNIT: WeightUnit = 'kg';

/**
 * Suffixes accepted after a weight literal, per unit family.
 * "k" is the shorthand most logs use ("75k").
 */
export const UNIT_MARKERS: Record<WeightUnit, string[]> = {
  kg: ['k', 'kg'],
  lb: ['lb', 'lbs'],
};

// ============================================================================
// Numeric Bounds
// ============================================================================

export const MAX_SET_COUNT = 1000;
export const MAX_REPETITIONS = 10000;

// ============================================================================
// Export Defaults
// ============================================================================

export const TSV_HEADER = ['Date', 'Exercise', 'Sets', 'Avg Reps', 'Weight'];
export const DEFAULT_TSV_DECIMAL_SEPARATOR = ',';
export const DEFAULT_EQUIPMENT = 'other';

export const DATE_LINE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
export const NOTE_LINE_PREFIX = '#';

/**
 * Runtime configuration
 *
 * Values come from the environment; a .env file in the working directory is
 * loaded first when present. Invalid values fall back to the defaults with a
 * warning.
 *
 *   SETLOG_WEIGHT_UNIT             kg | lb                 (default kg)
 *   SETLOG_SYNONYMS_PATH           extra synonym JSON file (optional)
 *   SETLOG_ON_LINE_ERROR           skip | abort            (default skip)
 *   SETLOG_TSV_DECIMAL_SEPARATOR   decimal mark in TSV     (default ",")
 */

import * as dotenv from 'dotenv';
import type { LineErrorPolicy, WeightUnit } from '../../shared/types';
import { DEFAULT_TSV_DECIMAL_SEPARATOR, DEFAULT_WEIGHT_UNIT } from '../../shared/constants';

export interface SetLogConfig {
  weightUnit: WeightUnit;
  synonymsPath?: string;
  onLineError: LineErrorPolicy;
  tsvDecimalSeparator: string;
}

let dotenvLoaded = false;

function loadDotenv(): void {
  if (!dotenvLoaded) {
    dotenv.config();
    dotenvLoaded = true;
  }
}

function isWeightUnit(value: unknown): value is WeightUnit {
  return value === 'kg' || value === 'lb';
}

function isLineErrorPolicy(value: unknown): value is LineErrorPolicy {
  return value === 'skip' || value === 'abort';
}

/**
 * Read configuration from an environment map
 *
 * @param env - Defaults to process.env after loading .env
 */
export function loadConfig(env?: NodeJS.ProcessEnv): SetLogConfig {
  if (!env) {
    loadDotenv();
  }
  const source = env ?? process.env;

  const rawUnit = source.SETLOG_WEIGHT_UNIT?.trim().toLowerCase();
  let weightUnit = DEFAULT_WEIGHT_UNIT;
  if (rawUnit) {
    if (isWeightUnit(rawUnit)) {
      weightUnit = rawUnit;
    } else {
      console.warn(`Ignoring SETLOG_WEIGHT_UNIT="${rawUnit}", using ${DEFAULT_WEIGHT_UNIT}`);
    }
  }

  const rawPolicy = source.SETLOG_ON_LINE_ERROR?.trim().toLowerCase();
  let onLineError: LineErrorPolicy = 'skip';
  if (rawPolicy) {
    if (isLineErrorPolicy(rawPolicy)) {
      onLineError = rawPolicy;
    } else {
      console.warn(`Ignoring SETLOG_ON_LINE_ERROR="${rawPolicy}", using skip`);
    }
  }

  const synonymsPath = source.SETLOG_SYNONYMS_PATH?.trim() || undefined;
  const tsvDecimalSeparator = source.SETLOG_TSV_DECIMAL_SEPARATOR || DEFAULT_TSV_DECIMAL_SEPARATOR;

  return {
    weightUnit,
    synonymsPath,
    onLineError,
    tsvDecimalSeparator,
  };
}

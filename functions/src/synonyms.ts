/**
 * Synonym extension file loading
 *
 * The file holds a JSON array of { canonical, synonyms[] } entries that are
 * appended to the bundled table before the first lookup.
 */

import * as fs from 'fs';
import type { SynonymEntry } from '../../shared/types';
import type { SetLogConfig } from './config';
import { getDefaultStandardizer, SynonymConfigurationError } from './services/setlog';
import type { NameStandardizer } from './services/setlog';

export function parseSynonymEntries(value: unknown, label = 'synonyms'): SynonymEntry[] {
  if (!Array.isArray(value)) {
    throw new SynonymConfigurationError(`${label} must be an array`);
  }

  return value.map((item: unknown, index) => {
    const itemLabel = `${label}[${index}]`;
    if (!item || typeof item !== 'object') {
      throw new SynonymConfigurationError(`${itemLabel} must be an object`);
    }

    const canonical = 'canonical' in item ? item.canonical : undefined;
    const synonyms = 'synonyms' in item ? item.synonyms : undefined;
    if (typeof canonical !== 'string' || canonical.trim().length === 0) {
      throw new SynonymConfigurationError(`${itemLabel}.canonical must be a non-empty string`);
    }
    if (!Array.isArray(synonyms)) {
      throw new SynonymConfigurationError(`${itemLabel}.synonyms must be an array of strings`);
    }
    const names = synonyms.filter((synonym: unknown): synonym is string => typeof synonym === 'string');
    if (names.length !== synonyms.length) {
      throw new SynonymConfigurationError(`${itemLabel}.synonyms must be an array of strings`);
    }

    return { canonical, synonyms: names };
  });
}

export function readSynonymFile(path: string): SynonymEntry[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SynonymConfigurationError(`Cannot read synonym file ${path}: ${reason}`);
  }
  return parseSynonymEntries(parsed, path);
}

// Synonym file each standardizer was extended from
const extendedFrom = new WeakMap<NameStandardizer, string>();

/**
 * The process-wide standardizer, extended from SETLOG_SYNONYMS_PATH when set.
 * A standardizer is extended from a given file once; a different file is
 * rejected by the table once it has been used.
 */
export function configureStandardizer(config: SetLogConfig): NameStandardizer {
  const standardizer = getDefaultStandardizer();
  const synonymsPath = config.synonymsPath;
  if (synonymsPath && extendedFrom.get(standardizer) !== synonymsPath) {
    const entries = readSynonymFile(synonymsPath);
    standardizer.extend(entries);
    extendedFrom.set(standardizer, synonymsPath);
    console.log(
      `Loaded ${entries.length} synonym entries from ${synonymsPath} (${standardizer.toTable().length} total)`
    );
  }
  return standardizer;
}

/**
 * Exercise Name Standardizer
 *
 * Maps free-text exercise names ("bp", "Bench", "press banca") to a
 * canonical form using a synonym table. Unknown names pass through with
 * whitespace normalized and their casing intact.
 *
 * Matching ignores case and accents; the canonical name keeps the casing
 * defined in the table. The table may be extended only until the first
 * lookup, after which it is sealed.
 */

import type { SynonymEntry } from '../../../../shared/types';
import { SynonymConfigurationError, SynonymTableSealedError } from './errors';
import defaultSynonyms from './synonyms.json';

export class NameStandardizer {
  private readonly entries: SynonymEntry[] = [];
  private readonly lookup = new Map<string, string>();
  private sealed = false;

  constructor(table: SynonymEntry[] = defaultSynonyms) {
    this.extend(table);
  }

  /**
   * Add synonym entries. Must run before any call to standardize().
   *
   * @throws SynonymConfigurationError when a key collides with an existing one
   * @throws SynonymTableSealedError after the first lookup
   */
  extend(entries: SynonymEntry[]): void {
    if (this.sealed) {
      throw new SynonymTableSealedError();
    }

    // Validate the whole batch before touching the table
    const staged = new Map<string, string>();
    const canonicals = new Set(this.entries.map((entry) => matchKey(entry.canonical)));

    for (const entry of entries) {
      const canonical = normalizeWhitespace(entry.canonical);
      if (canonical.length === 0) {
        throw new SynonymConfigurationError('Canonical name cannot be empty');
      }

      const canonicalKey = matchKey(canonical);
      if (canonicals.has(canonicalKey)) {
        throw new SynonymConfigurationError(`Canonical name "${canonical}" is defined twice`);
      }
      canonicals.add(canonicalKey);

      for (const [index, raw] of [canonical, ...entry.synonyms].entries()) {
        const key = matchKey(raw);
        if (key.length === 0) {
          throw new SynonymConfigurationError(`Empty synonym for "${canonical}"`);
        }
        // An entry may repeat its own canonical name among its synonyms
        if (index > 0 && key === canonicalKey) {
          continue;
        }
        const owner = staged.get(key) ?? this.lookup.get(key);
        if (owner !== undefined) {
          throw new SynonymConfigurationError(
            `"${raw}" is listed for both "${owner}" and "${canonical}"`
          );
        }
        staged.set(key, canonical);
      }
    }

    for (const [key, canonical] of staged) {
      this.lookup.set(key, canonical);
    }
    for (const entry of entries) {
      this.entries.push({
        canonical: normalizeWhitespace(entry.canonical),
        synonyms: [...entry.synonyms],
      });
    }
  }

  standardize(raw: string): string {
    this.sealed = true;
    const normalized = normalizeWhitespace(raw);
    return this.lookup.get(matchKey(normalized)) ?? normalized;
  }

  /**
   * Copy of the current table
   */
  toTable(): SynonymEntry[] {
    return this.entries.map((entry) => ({
      canonical: entry.canonical,
      synonyms: [...entry.synonyms],
    }));
  }
}

export function normalizeWhitespace(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

/**
 * Comparison key: whitespace-normalized, lower-cased, accents stripped
 */
export function matchKey(value: string): string {
  return normalizeWhitespace(value)
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase();
}

let defaultStandardizer: NameStandardizer | null = null;

/**
 * Process-wide standardizer built from the bundled synonym table
 */
export function getDefaultStandardizer(): NameStandardizer {
  if (!defaultStandardizer) {
    defaultStandardizer = new NameStandardizer();
  }
  return defaultStandardizer;
}

export function resetDefaultStandardizer(): void {
  defaultStandardizer = null;
}

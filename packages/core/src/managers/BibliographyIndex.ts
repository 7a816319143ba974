import type { BibEntry, LoadError, Result } from '../types/index.js';
import { err, ok } from '../types/index.js';
import { BibTeXParser } from '../parsers/BibTeXParser.js';

/**
 * BibliographyIndex is the read-only lookup of bibliographic records by
 * citation key for one assembly run.
 *
 * Keys are case-sensitive. A key appearing twice makes the whole build
 * fail with `DuplicateKey`; nothing is overwritten. The index is built
 * fresh for every run and never mutated afterwards.
 *
 * @example
 * ```typescript
 * const built = BibliographyIndex.build(bibSource);
 * if (!built.ok) {
 *   return built.error; // ParseError or DuplicateKey
 * }
 * const entry = built.value.get('smith2020');
 * ```
 */
export class BibliographyIndex {
  private readonly entriesByKey: ReadonlyMap<string, BibEntry>;
  private readonly orderedEntries: readonly BibEntry[];

  private constructor(entries: readonly BibEntry[]) {
    this.orderedEntries = Object.freeze([...entries]);
    this.entriesByKey = new Map(entries.map(entry => [entry.key, entry]));
  }

  /**
   * Parse a BibTeX source and index its records.
   */
  static build(bibliographySource: string): Result<BibliographyIndex, LoadError> {
    const parsed = BibTeXParser.parse(bibliographySource);
    if (!parsed.ok) {
      return parsed;
    }
    return BibliographyIndex.fromEntries(parsed.value);
  }

  /**
   * Index already-parsed records, rejecting duplicate keys.
   */
  static fromEntries(entries: readonly BibEntry[]): Result<BibliographyIndex, LoadError> {
    const seen = new Map<string, BibEntry>();
    for (const entry of entries) {
      const first = seen.get(entry.key);
      if (first) {
        const duplicate: LoadError = {
          kind: 'DuplicateKey',
          key: entry.key,
          firstPosition: first.position,
          position: entry.position,
        };
        return err(duplicate);
      }
      seen.set(entry.key, entry);
    }
    return ok(new BibliographyIndex(entries));
  }

  /**
   * Look up a record by exact key.
   */
  get(key: string): BibEntry | undefined {
    return this.entriesByKey.get(key);
  }

  has(key: string): boolean {
    return this.entriesByKey.has(key);
  }

  /**
   * Keys in source order.
   */
  keys(): string[] {
    return this.orderedEntries.map(entry => entry.key);
  }

  entries(): readonly BibEntry[] {
    return this.orderedEntries;
  }

  get size(): number {
    return this.orderedEntries.length;
  }
}

import type { BibEntry, LoadError, Result } from '../types/index.js';
import { err, ok } from '../types/index.js';
import { LineIndex } from '../utils/text.js';

const MONTH_MACROS: ReadonlyArray<[string, string]> = [
  ['jan', 'January'],
  ['feb', 'February'],
  ['mar', 'March'],
  ['apr', 'April'],
  ['may', 'May'],
  ['jun', 'June'],
  ['jul', 'July'],
  ['aug', 'August'],
  ['sep', 'September'],
  ['oct', 'October'],
  ['nov', 'November'],
  ['dec', 'December'],
];

const FIELD_NAME_CHAR = /[A-Za-z0-9_\-:.+/]/;
const KEY_STOP_CHAR = /[\s,{}=]/;

/**
 * Internal signal carrying a parse failure up to `parse()`.
 */
class BibParseFailure extends Error {
  constructor(readonly loadError: LoadError) {
    super(loadError.kind === 'ParseError' ? loadError.reason : loadError.kind);
    this.name = 'BibParseFailure';
  }
}

/**
 * BibTeXParser turns a BibTeX database into `BibEntry` records.
 *
 * Supports:
 * - `{...}` and `(...)` entry delimiters
 * - braced, quoted, numeric and macro values joined with `#`
 * - `@string` macros (month abbreviations predefined)
 * - `@comment` and `@preamble` blocks, which are skipped
 *
 * Text between entries is ignored. Duplicate keys are not checked here;
 * see `BibliographyIndex`.
 *
 * @example
 * ```typescript
 * const parsed = BibTeXParser.parse('@article{smith2020, title = {A study}}');
 * if (parsed.ok) {
 *   console.log(parsed.value[0].fields.title); // "A study"
 * }
 * ```
 */
export class BibTeXParser {
  private pos = 0;
  private readonly macros: Map<string, string> = new Map(MONTH_MACROS);
  private readonly lines: LineIndex;

  private constructor(private readonly source: string) {
    this.lines = new LineIndex(source);
  }

  /**
   * Parse every record in `source`, in source order.
   */
  static parse(source: string): Result<BibEntry[], LoadError> {
    return new BibTeXParser(source).parseAll();
  }

  private parseAll(): Result<BibEntry[], LoadError> {
    const entries: BibEntry[] = [];

    try {
      for (;;) {
        const at = this.source.indexOf('@', this.pos);
        if (at === -1) {
          break;
        }
        this.pos = at + 1;

        // An '@' glued to a word (e.g. an e-mail address) is free text
        if (at > 0 && /\w/.test(this.source[at - 1])) {
          continue;
        }

        const type = this.readWhile(/[A-Za-z]/);
        if (!type) {
          continue;
        }

        this.skipWhitespace();
        const open = this.source[this.pos];
        if (open !== '{' && open !== '(') {
          throw this.failure(this.pos, `expected '{' or '(' after @${type}`);
        }
        const close = open === '{' ? '}' : ')';
        this.pos++;

        switch (type.toLowerCase()) {
          case 'comment':
          case 'preamble':
            this.skipBalanced(at, open, close);
            break;
          case 'string':
            this.parseStringDefinition(at, close);
            break;
          default:
            entries.push(this.parseEntry(at, type.toLowerCase(), close));
        }
      }
    } catch (error) {
      if (error instanceof BibParseFailure) {
        return err(error.loadError);
      }
      throw error;
    }

    return ok(entries);
  }

  private parseEntry(start: number, type: string, close: string): BibEntry {
    this.skipWhitespace();
    const keyStart = this.pos;
    while (this.pos < this.source.length) {
      const char = this.source[this.pos];
      if (KEY_STOP_CHAR.test(char) || char === close) {
        break;
      }
      this.pos++;
    }
    this.ensureNotAtEnd(start);

    const key = this.source.slice(keyStart, this.pos);
    this.skipWhitespace();
    this.ensureNotAtEnd(start);

    if (!key || this.source[this.pos] === '=') {
      throw this.failure(keyStart, `missing citation key in @${type} entry`);
    }

    const fields: Record<string, string> = {};

    if (this.source[this.pos] === close) {
      this.pos++;
      return this.buildEntry(start, type, key, fields);
    }

    if (this.source[this.pos] !== ',') {
      throw this.failure(this.pos, `expected ',' after citation key "${key}"`);
    }
    this.pos++;

    for (;;) {
      this.skipWhitespace();
      this.ensureNotAtEnd(start);

      if (this.source[this.pos] === close) {
        this.pos++;
        break;
      }

      const nameStart = this.pos;
      const name = this.readWhile(FIELD_NAME_CHAR);
      if (!name) {
        throw this.failure(nameStart, `unexpected character '${this.source[this.pos]}' in entry "${key}"`);
      }

      this.skipWhitespace();
      this.ensureNotAtEnd(start);
      if (this.source[this.pos] !== '=') {
        throw this.failure(this.pos, `missing '=' after field "${name}" in entry "${key}"`);
      }
      this.pos++;

      const value = this.readValue(start);
      const fieldName = name.toLowerCase();
      if (!(fieldName in fields)) {
        fields[fieldName] = value;
      }

      this.skipWhitespace();
      this.ensureNotAtEnd(start);
      const next = this.source[this.pos];
      if (next === ',') {
        this.pos++;
        continue;
      }
      if (next === close) {
        this.pos++;
        break;
      }
      throw this.failure(this.pos, `expected ',' or '${close}' after field "${name}" in entry "${key}"`);
    }

    return this.buildEntry(start, type, key, fields);
  }

  private buildEntry(start: number, type: string, key: string, fields: Record<string, string>): BibEntry {
    return Object.freeze({
      key,
      type,
      fields: Object.freeze(fields),
      rawSource: this.source.slice(start, this.pos),
      position: this.lines.positionAt(start),
    });
  }

  private parseStringDefinition(start: number, close: string): void {
    this.skipWhitespace();
    const nameStart = this.pos;
    const name = this.readWhile(FIELD_NAME_CHAR);
    if (!name) {
      throw this.failure(nameStart, 'missing macro name in @string');
    }

    this.skipWhitespace();
    this.ensureNotAtEnd(start);
    if (this.source[this.pos] !== '=') {
      throw this.failure(this.pos, `missing '=' after @string name "${name}"`);
    }
    this.pos++;

    const value = this.readValue(start);
    this.skipWhitespace();
    this.ensureNotAtEnd(start);
    if (this.source[this.pos] !== close) {
      throw this.failure(this.pos, `expected '${close}' to close @string "${name}"`);
    }
    this.pos++;

    this.macros.set(name.toLowerCase(), value);
  }

  /**
   * Read `piece (# piece)*` and return the concatenation with whitespace collapsed.
   */
  private readValue(entryStart: number): string {
    const parts: string[] = [];

    for (;;) {
      this.skipWhitespace();
      this.ensureNotAtEnd(entryStart);

      const char = this.source[this.pos];
      if (char === '{') {
        parts.push(this.readBraced(entryStart));
      } else if (char === '"') {
        parts.push(this.readQuoted());
      } else if (/[0-9]/.test(char)) {
        parts.push(this.readWhile(/[0-9]/));
      } else if (/[A-Za-z_]/.test(char)) {
        const macroStart = this.pos;
        const macro = this.readWhile(FIELD_NAME_CHAR);
        const expansion = this.macros.get(macro.toLowerCase());
        if (expansion === undefined) {
          throw this.failure(macroStart, `undefined string macro "${macro}"`);
        }
        parts.push(expansion);
      } else {
        throw this.failure(this.pos, 'missing field value');
      }

      this.skipWhitespace();
      if (this.source[this.pos] === '#') {
        this.pos++;
        continue;
      }
      break;
    }

    return parts.join('').replace(/\s+/g, ' ').trim();
  }

  private readBraced(entryStart: number): string {
    const contentStart = this.pos + 1;
    let depth = 0;

    while (this.pos < this.source.length) {
      const char = this.source[this.pos];
      if (char === '{') {
        depth++;
      } else if (char === '}') {
        depth--;
        if (depth === 0) {
          const value = this.source.slice(contentStart, this.pos);
          this.pos++;
          return value;
        }
      }
      this.pos++;
    }

    throw this.failure(entryStart, 'unterminated entry: unbalanced braces');
  }

  private readQuoted(): string {
    const quoteStart = this.pos;
    this.pos++;
    let depth = 0;

    while (this.pos < this.source.length) {
      const char = this.source[this.pos];
      if (char === '{') {
        depth++;
      } else if (char === '}') {
        depth--;
      } else if (char === '"' && depth === 0) {
        const value = this.source.slice(quoteStart + 1, this.pos);
        this.pos++;
        return value;
      }
      this.pos++;
    }

    throw this.failure(quoteStart, 'unterminated quoted value');
  }

  private skipBalanced(start: number, open: string, close: string): void {
    let depth = 1;
    while (this.pos < this.source.length) {
      const char = this.source[this.pos];
      this.pos++;
      if (char === open) {
        depth++;
      } else if (char === close) {
        depth--;
        if (depth === 0) {
          return;
        }
      }
    }
    throw this.failure(start, 'unterminated entry: missing closing delimiter');
  }

  private readWhile(pattern: RegExp): string {
    const start = this.pos;
    while (this.pos < this.source.length && pattern.test(this.source[this.pos])) {
      this.pos++;
    }
    return this.source.slice(start, this.pos);
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length && /\s/.test(this.source[this.pos])) {
      this.pos++;
    }
  }

  private ensureNotAtEnd(entryStart: number): void {
    if (this.pos >= this.source.length) {
      throw this.failure(entryStart, 'unterminated entry: missing closing delimiter');
    }
  }

  private failure(offset: number, reason: string): BibParseFailure {
    return new BibParseFailure({
      kind: 'ParseError',
      position: this.lines.positionAt(offset),
      reason,
    });
  }
}

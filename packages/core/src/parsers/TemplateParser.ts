import type {
  ContentFormat,
  PlaceholderInsert,
  PlaceholderSpec,
  Result,
  SectionKind,
  Template,
  TemplateError,
} from '../types/index.js';
import { SECTION_KINDS, err, ok } from '../types/index.js';

/**
 * A placeholder, bibliography or citation-packages token found in template source.
 */
export interface TemplateToken {
  start: number;
  end: number;
  type: 'section' | 'bibliography' | 'citationPackages';
  name: string | null;           // Placeholder name for section tokens
}

export const TOKEN_PATTERN = /\{\{\s*(?:SECTION:([A-Za-z0-9_-]+)|(BIBLIOGRAPHY)|(CITATION_PACKAGES))\s*\}\}/g;

const PLACEHOLDER_NAME = /^[A-Za-z0-9_-]+$/;
const CONTENT_FORMATS: readonly ContentFormat[] = ['latex', 'verbatim'];
const INSERT_MODES: readonly PlaceholderInsert[] = ['content', 'heading', 'section'];

/**
 * Find every `{{SECTION:name}}`, `{{BIBLIOGRAPHY}}` and `{{CITATION_PACKAGES}}`
 * token, in source order.
 */
export function findTemplateTokens(source: string): TemplateToken[] {
  const tokens: TemplateToken[] = [];
  const pattern = new RegExp(TOKEN_PATTERN.source, 'g');
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(source)) !== null) {
    tokens.push({
      start: match.index,
      end: match.index + match[0].length,
      type: match[2] ? 'bibliography' : match[3] ? 'citationPackages' : 'section',
      name: match[1] ?? null,
    });
  }

  return tokens;
}

/**
 * Build a `Template` from LaTeX source and its side declaration.
 *
 * The declaration is untrusted JSON:
 *
 * @example
 * ```json
 * {
 *   "name": "medical-article",
 *   "contentFormat": "latex",
 *   "placeholders": [
 *     { "name": "title", "kind": "Title", "required": true },
 *     { "name": "abstract", "kind": "Abstract", "required": true },
 *     { "name": "body", "kind": "BodySection", "repeat": true }
 *   ]
 * }
 * ```
 */
export function parseTemplate(
  source: string,
  declaration: unknown,
  fallbackName = 'template'
): Result<Template, TemplateError> {
  if (!isRecord(declaration)) {
    return err(templateError('Template declaration must be a JSON object'));
  }

  let name = fallbackName;
  if (declaration.name !== undefined) {
    if (typeof declaration.name !== 'string' || !declaration.name.trim()) {
      return err(templateError('Template "name" must be a non-empty string'));
    }
    name = declaration.name.trim();
  }

  let contentFormat: ContentFormat = 'latex';
  if (declaration.contentFormat !== undefined) {
    const format = CONTENT_FORMATS.find(candidate => candidate === declaration.contentFormat);
    if (!format) {
      return err(templateError(`Template "contentFormat" must be one of: ${CONTENT_FORMATS.join(', ')}`));
    }
    contentFormat = format;
  }

  const rawPlaceholders = declaration.placeholders ?? [];
  if (!Array.isArray(rawPlaceholders)) {
    return err(templateError('Template "placeholders" must be an array'));
  }

  const placeholders: PlaceholderSpec[] = [];
  const seen = new Set<string>();

  for (const [index, raw] of rawPlaceholders.entries()) {
    const parsed = parsePlaceholder(raw, index);
    if (!parsed.ok) {
      return parsed;
    }
    if (seen.has(parsed.value.name)) {
      return err(templateError(`Duplicate placeholder "${parsed.value.name}"`, parsed.value.name));
    }
    seen.add(parsed.value.name);
    placeholders.push(parsed.value);
  }

  return ok({ name, source, placeholders, contentFormat });
}

function parsePlaceholder(raw: unknown, index: number): Result<PlaceholderSpec, TemplateError> {
  if (!isRecord(raw)) {
    return err(templateError(`Placeholder #${index + 1} must be an object`));
  }

  if (typeof raw.name !== 'string' || !PLACEHOLDER_NAME.test(raw.name)) {
    return err(templateError(`Placeholder #${index + 1} needs a "name" of letters, digits, "_" or "-"`));
  }
  const name = raw.name;

  const kind = SECTION_KINDS.find(candidate => candidate === raw.kind);
  if (!kind) {
    return err(
      templateError(
        `Placeholder "${name}" has unknown kind ${JSON.stringify(raw.kind)}; expected one of: ${SECTION_KINDS.join(', ')}`,
        name
      )
    );
  }

  if (raw.heading !== undefined && (typeof raw.heading !== 'string' || !raw.heading.trim())) {
    return err(templateError(`Placeholder "${name}": "heading" must be a non-empty string`, name));
  }

  for (const flag of ['required', 'repeat'] as const) {
    if (raw[flag] !== undefined && typeof raw[flag] !== 'boolean') {
      return err(templateError(`Placeholder "${name}": "${flag}" must be a boolean`, name));
    }
  }
  const required = raw.required === true;
  const repeat = raw.repeat === true;

  let insert = defaultInsert(kind, repeat);
  if (raw.insert !== undefined) {
    const mode = INSERT_MODES.find(candidate => candidate === raw.insert);
    if (!mode) {
      return err(templateError(`Placeholder "${name}": "insert" must be one of: ${INSERT_MODES.join(', ')}`, name));
    }
    insert = mode;
  }

  const spec: PlaceholderSpec = { name, kind, required, repeat, insert };
  if (typeof raw.heading === 'string') {
    spec.heading = raw.heading.trim();
  }
  return ok(spec);
}

function defaultInsert(kind: SectionKind, repeat: boolean): PlaceholderInsert {
  if (kind === 'Title') {
    return 'heading';
  }
  return repeat ? 'section' : 'content';
}

function templateError(reason: string, placeholder?: string): TemplateError {
  return placeholder === undefined
    ? { kind: 'TemplateError', reason }
    : { kind: 'TemplateError', reason, placeholder };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Core type definitions for the manuscript assembly engine.
 *
 * Every structure here lives for one assembly run only: the orchestrator
 * builds it, hands it read-only to the next stage and drops it when the
 * run finishes.
 */

// ============================================================================
// Result Models
// ============================================================================

/**
 * Outcome of an operation that can fail without throwing.
 */
export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ============================================================================
// Bibliography Models
// ============================================================================

/**
 * Location inside a source text.
 */
export interface SourcePosition {
  offset: number;                // 0-based character offset
  line: number;                  // 1-based line
  column: number;                // 1-based column
}

/**
 * One bibliographic record.
 */
export interface BibEntry {
  key: string;                   // Citation key, case-sensitive, verbatim
  type: string;                  // Entry type, lower-cased (article, book, ...)
  fields: Readonly<Record<string, string>>;  // Lower-cased field name -> value
  rawSource: string;             // Original record text from '@' to closing delimiter
  position: SourcePosition;      // Where the record starts
}

/**
 * Fatal bibliography load failures.
 */
export type LoadError =
  | {
      kind: 'ParseError';
      position: SourcePosition;
      reason: string;
    }
  | {
      kind: 'DuplicateKey';
      key: string;
      firstPosition: SourcePosition;
      position: SourcePosition;
    };

// ============================================================================
// Section Models
// ============================================================================

export type SectionKind =
  | 'Title'
  | 'Abstract'
  | 'Keywords'
  | 'BodySection'
  | 'Subsection'
  | 'References'
  | 'Other';

export const SECTION_KINDS: readonly SectionKind[] = [
  'Title',
  'Abstract',
  'Keywords',
  'BodySection',
  'Subsection',
  'References',
  'Other',
];

/**
 * One logical unit of the manuscript. Sections are stored flat; nesting
 * is expressed through `level` only.
 */
export interface Section {
  kind: SectionKind;
  heading: string;               // Empty for the implicit leading section
  level: number;                 // Relative nesting depth, 1 = top level
  depth: number;                 // Number of '#' in the source heading, 0 if unheaded
  rawContent: string;            // Text after the heading line, up to the next heading
  order: number;                 // Position in the split sequence
}

/**
 * A vocabulary row: any of `keywords` appearing in a heading, or a heading
 * that is exactly one of `headings`, selects `kind`.
 */
export interface HeadingVocabularyEntry {
  kind: SectionKind;
  keywords: readonly string[];
  headings?: readonly string[];  // Whole-heading matches only
}

export type HeadingVocabulary = readonly HeadingVocabularyEntry[];

// ============================================================================
// Citation Models
// ============================================================================

/**
 * One key occurrence inside a citation group.
 */
export interface CitationMarker {
  key: string;
  spanStart: number;             // Offset of the group's '[' in rawContent
  spanEnd: number;               // Offset just past the group's ']'
  resolved: boolean;             // True only when the whole group resolved
  found: boolean;                // Whether this key alone exists in the index
  renderedText: string | null;   // Group replacement when resolved
}

/**
 * A bracketed marker such as `[@a; @b, p. 4]`, resolved as one unit.
 */
export interface CitationGroup {
  spanStart: number;
  spanEnd: number;
  sourceText: string;            // The marker exactly as written
  keys: string[];                // In original left-to-right order
  locators: (string | null)[];   // Parallel to keys
  resolved: boolean;
  renderedText: string;          // Citation command, or the flagged placeholder
}

export interface CitedItem {
  entry: BibEntry;
  locator: string | null;
}

/**
 * Pluggable citation rendering (numeric, author-year, ...).
 */
export interface CitationRenderRule {
  readonly name: string;
  renderCitation(items: readonly CitedItem[]): string;
  renderUnresolved(keys: readonly string[], sourceText: string): string;
  renderBibliography?(entries: readonly BibEntry[]): string;
  renderPreamble?(): string;     // Packages the citation commands need
}

/**
 * A section after citation resolution.
 */
export interface ResolvedSection extends Section {
  resolvedContent: string;       // rawContent with every group replaced
  citations: CitationGroup[];
  markers: CitationMarker[];
}

// ============================================================================
// Template Models
// ============================================================================

/**
 * How a matched section is written into its placeholder.
 * - content: body only
 * - heading: heading text only
 * - section: sectioning command followed by the body
 */
export type PlaceholderInsert = 'content' | 'heading' | 'section';

export type ContentFormat = 'latex' | 'verbatim';

export interface PlaceholderSpec {
  name: string;
  kind: SectionKind;
  heading?: string;
  required: boolean;
  repeat: boolean;
  insert: PlaceholderInsert;
}

export interface Template {
  name: string;
  source: string;                // LaTeX with {{SECTION:name}} and {{BIBLIOGRAPHY}} tokens
  placeholders: PlaceholderSpec[];
  contentFormat: ContentFormat;
}

/**
 * Side declaration accompanying a template source, as read from JSON.
 */
export interface TemplateDeclaration {
  name?: unknown;
  contentFormat?: unknown;
  placeholders?: unknown;
}

export interface TemplateError {
  kind: 'TemplateError';
  reason: string;
  placeholder?: string;
}

// ============================================================================
// Diagnostics & Results
// ============================================================================

export type PipelineStage =
  | 'Idle'
  | 'BuildingBibliography'
  | 'SplittingSections'
  | 'ResolvingCitations'
  | 'Merging'
  | 'Done'
  | 'Failed';

export type DiagnosticCategory = 'structural' | 'citation';

export type DiagnosticCode =
  | 'REQUIRED_PLACEHOLDER_MISSING'
  | 'SECTION_UNUSED'
  | 'UNDECLARED_TOKEN'
  | 'PLACEHOLDER_NOT_IN_SOURCE'
  | 'CITATION_NOT_FOUND'
  | 'UNRESOLVED_SUMMARY'
  | 'CITATION_PACKAGES_NOT_PLACED';

/**
 * Non-fatal condition surfaced for human review.
 */
export interface Diagnostic {
  category: DiagnosticCategory;
  code: DiagnosticCode;
  message: string;
  stage: PipelineStage;
  placeholder?: string;
  key?: string;
  sectionOrder?: number;
}

export interface SectionRef {
  order: number;
  kind: SectionKind;
  heading: string;
}

export interface PlaceholderFill {
  placeholder: string;
  sections: SectionRef[];
}

export interface MergeResult {
  finalDocument: string;
  sectionsUsed: PlaceholderFill[];
  sectionsUnused: SectionRef[];
  emptyPlaceholders: string[];
  diagnostics: Diagnostic[];
}

/**
 * Terminal artifact of one assembly run.
 */
export interface AssemblyResult extends MergeResult {
  unresolvedCitations: Set<string>;
  citedKeys: string[];           // First-citation order, resolved groups only
  bibliography: string;          // rawSource of cited entries, same order
  warnings: string[];            // Messages of `diagnostics`, in order
}

export interface InternalError {
  kind: 'InternalError';
  message: string;
}

export interface AssemblyError {
  stage: PipelineStage;
  error: LoadError | TemplateError | InternalError;
}

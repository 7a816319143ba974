/**
 * @manuscript-assembler/core
 *
 * Document assembly and citation resolution engine.
 * Turns converted manuscript markdown, a BibTeX bibliography and a
 * journal LaTeX template into one LaTeX document plus diagnostics.
 *
 * @packageDocumentation
 */

// ============================================================================
// Type Exports
// ============================================================================

/**
 * Result Models
 *
 * Fallible operations return values instead of throwing.
 */
export type { Result } from './types/index.js';
export { ok, err } from './types/index.js';

/**
 * Bibliography Models
 *
 * Types for bibliographic records and load failures.
 */
export type {
  SourcePosition,
  BibEntry,
  LoadError,
} from './types/index.js';

/**
 * Section Models
 *
 * Types for the split manuscript.
 */
export type {
  SectionKind,
  Section,
  HeadingVocabularyEntry,
  HeadingVocabulary,
} from './types/index.js';
export { SECTION_KINDS } from './types/index.js';

/**
 * Citation Models
 *
 * Types for citation markers, groups and rendering rules.
 */
export type {
  CitationMarker,
  CitationGroup,
  CitedItem,
  CitationRenderRule,
  ResolvedSection,
} from './types/index.js';

/**
 * Template Models
 *
 * Types for journal templates and their placeholder declarations.
 */
export type {
  PlaceholderInsert,
  ContentFormat,
  PlaceholderSpec,
  Template,
  TemplateDeclaration,
  TemplateError,
} from './types/index.js';

/**
 * Assembly Models
 *
 * Types for pipeline stages, diagnostics and results.
 */
export type {
  PipelineStage,
  DiagnosticCategory,
  DiagnosticCode,
  Diagnostic,
  SectionRef,
  PlaceholderFill,
  MergeResult,
  AssemblyResult,
  InternalError,
  AssemblyError,
} from './types/index.js';

// ============================================================================
// Manager Exports
// ============================================================================

/**
 * Bibliography Index
 *
 * Read-only lookup of BibTeX records by citation key.
 */
export { BibliographyIndex } from './managers/BibliographyIndex.js';

// ============================================================================
// Parser Exports
// ============================================================================

/**
 * BibTeX Parser
 *
 * Parses BibTeX source into entries, reporting positioned parse errors.
 */
export { BibTeXParser } from './parsers/BibTeXParser.js';

/**
 * Section Splitter
 *
 * Cuts manuscript markdown into typed sections.
 */
export { SectionSplitter, joinSections } from './parsers/SectionSplitter.js';
export type { SectionSplitterOptions } from './parsers/SectionSplitter.js';

/**
 * Heading Vocabulary
 *
 * Keyword table mapping headings to section kinds.
 */
export {
  DEFAULT_HEADING_VOCABULARY,
  extendVocabulary,
  normalizeHeading,
  classifyHeading,
} from './parsers/HeadingVocabulary.js';

/**
 * Template Parser
 *
 * Validates template declarations and finds placeholder tokens.
 */
export { parseTemplate, findTemplateTokens } from './parsers/TemplateParser.js';
export type { TemplateToken } from './parsers/TemplateParser.js';

// ============================================================================
// Service Exports
// ============================================================================

/**
 * Citation Resolver
 *
 * Rewrites `[@key]` markers into citation commands.
 */
export { CitationResolver, findCitationGroups } from './services/CitationResolver.js';
export type { ParsedCitationGroup, ResolveOutput } from './services/CitationResolver.js';

/**
 * Citation Styles
 *
 * Built-in numeric, natbib and biblatex rendering rules.
 */
export {
  CITATION_STYLE_NAMES,
  createNumericStyle,
  createNatbibStyle,
  createBiblatexStyle,
  getCitationStyle,
  isCitationStyleName,
  formatVancouver,
} from './services/CitationStyles.js';
export type { CitationStyleName, BibliographyFileOptions } from './services/CitationStyles.js';

/**
 * Template Merger
 *
 * Places resolved sections into template placeholders.
 */
export { TemplateMerger } from './services/TemplateMerger.js';
export type { TemplateMergerOptions } from './services/TemplateMerger.js';

/**
 * LaTeX Content Renderer
 *
 * Converts section markdown into LaTeX.
 */
export { LatexContentRenderer } from './services/LatexContentRenderer.js';

/**
 * Assembly Orchestrator
 *
 * Runs the whole pipeline for one manuscript.
 */
export { AssemblyOrchestrator, assemble, describeAssemblyError } from './services/AssemblyOrchestrator.js';
export type { AssemblyInput, AssembleOptions, TemplateSource } from './services/AssemblyOrchestrator.js';

/**
 * Run Context
 *
 * Per-run stage tracking and logger.
 */
export { RunContext, createRunContext } from './services/RunContext.js';
export type { RunContextOptions, StageTransition, StageChangeListener } from './services/RunContext.js';

// ============================================================================
// Utility Exports
// ============================================================================

export { LoggingService, LogLevel, parseLogLevel } from './utils/LoggingService.js';
export type { Logger, LogSink } from './utils/LoggingService.js';
export { escapeLatex, getSectionCommand } from './utils/latex.js';
export { formatPosition, normalizeForMatching } from './utils/text.js';

import type {
  AssemblyError,
  AssemblyResult,
  CitationRenderRule,
  Diagnostic,
  HeadingVocabulary,
  Result,
  Template,
  TemplateError,
} from '../types/index.js';
import { err, ok } from '../types/index.js';
import { BibliographyIndex } from '../managers/BibliographyIndex.js';
import { SectionSplitter } from '../parsers/SectionSplitter.js';
import { parseTemplate } from '../parsers/TemplateParser.js';
import { formatPosition } from '../utils/text.js';
import { CitationResolver } from './CitationResolver.js';
import { getCitationStyle } from './CitationStyles.js';
import type { CitationStyleName } from './CitationStyles.js';
import { RunContext } from './RunContext.js';
import { TemplateMerger } from './TemplateMerger.js';

/**
 * Template text with its undecoded side declaration, validated during merging.
 */
export interface TemplateSource {
  name?: string;
  source: string;
  declaration: unknown;
}

export interface AssemblyInput {
  markdown: string;
  bibliographySource: string;
  template: Template | TemplateSource;
}

export interface AssembleOptions {
  citationStyle?: CitationStyleName | CitationRenderRule;   // Default 'numeric'
  bibliographyFile?: string;     // Base name of the written .bib, for natbib and biblatex
  vocabulary?: HeadingVocabulary;
  context?: RunContext;
}

/**
 * Describe a fatal assembly error in one line.
 */
export function describeAssemblyError(failure: AssemblyError): string {
  const error = failure.error;
  switch (error.kind) {
    case 'ParseError':
      return `${failure.stage}: bibliography parse error at ${formatPosition(error.position)}: ${error.reason}`;
    case 'DuplicateKey':
      return `${failure.stage}: duplicate bibliography key "${error.key}" at ${formatPosition(error.position)} (first defined at ${formatPosition(error.firstPosition)})`;
    case 'TemplateError':
      return `${failure.stage}: template error: ${error.reason}`;
    case 'InternalError':
      return `${failure.stage}: internal error: ${error.message}`;
  }
}

/**
 * AssemblyOrchestrator runs one manuscript through the pipeline:
 * bibliography index, section split, citation resolution, template merge.
 *
 * Fatal errors stop the run at their stage and come back as
 * `{ stage, error }`; everything else becomes a diagnostic on the result.
 * Each call builds its own index and sections and shares nothing with
 * other runs.
 *
 * @example
 * ```typescript
 * const result = new AssemblyOrchestrator().assemble(
 *   { markdown, bibliographySource, template },
 *   { citationStyle: 'natbib' }
 * );
 * if (result.ok) {
 *   console.error(result.value.warnings.join('\n'));
 * }
 * ```
 */
export class AssemblyOrchestrator {
  assemble(input: AssemblyInput, options: AssembleOptions = {}): Result<AssemblyResult, AssemblyError> {
    const context = options.context ?? new RunContext();
    const logger = context.logger;

    if (context.stage !== 'Idle') {
      const reused: AssemblyError = {
        stage: context.stage,
        error: { kind: 'InternalError', message: `Run context ${context.runId} has already been used` },
      };
      return err(reused);
    }

    try {
      const style = resolveStyle(options.citationStyle ?? 'numeric', options.bibliographyFile);

      context.advance('BuildingBibliography');
      const built = BibliographyIndex.build(input.bibliographySource);
      if (!built.ok) {
        return this.fail(context, built.error);
      }
      const index = built.value;
      logger.debug(`Indexed ${index.size} bibliography entries`);

      context.advance('SplittingSections');
      const sections = new SectionSplitter({ vocabulary: options.vocabulary }).split(input.markdown);
      logger.debug(`Split manuscript into ${sections.length} sections`);

      context.advance('ResolvingCitations');
      const resolution = new CitationResolver(index, style).resolve(sections);

      context.advance('Merging');
      const template = toTemplate(input.template);
      if (!template.ok) {
        return this.fail(context, template.error);
      }
      const merger = new TemplateMerger({
        style,
        citedEntries: resolution.citedEntries,
        vocabulary: options.vocabulary,
      });
      const merged = merger.merge(resolution.sections, template.value);

      const diagnostics: Diagnostic[] = [...resolution.diagnostics, ...merged.diagnostics];
      if (resolution.unresolvedKeys.size > 0) {
        const keys = [...resolution.unresolvedKeys].sort();
        diagnostics.push({
          category: 'citation',
          code: 'UNRESOLVED_SUMMARY',
          message: `${keys.length} unresolved citation key(s): ${keys.join(', ')}`,
          stage: 'ResolvingCitations',
        });
      }

      context.advance('Done');
      logger.info(
        `Assembled "${template.value.name}": ${diagnostics.length} warning(s), ${resolution.unresolvedKeys.size} unresolved key(s)`
      );

      return ok({
        ...merged,
        diagnostics,
        warnings: diagnostics.map(diagnostic => diagnostic.message),
        unresolvedCitations: resolution.unresolvedKeys,
        citedKeys: resolution.citedEntries.map(entry => entry.key),
        bibliography: resolution.citedEntries.map(entry => `${entry.rawSource}\n`).join('\n'),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Assembly aborted by an unexpected error', error instanceof Error ? error : undefined);
      return this.fail(context, { kind: 'InternalError', message });
    }
  }

  private fail(context: RunContext, error: AssemblyError['error']): Result<AssemblyResult, AssemblyError> {
    const stage = context.fail();
    const failure: AssemblyError = { stage, error };
    context.logger.warn(describeAssemblyError(failure));
    return err(failure);
  }
}

/**
 * Run one assembly with a fresh orchestrator.
 */
export function assemble(input: AssemblyInput, options: AssembleOptions = {}): Result<AssemblyResult, AssemblyError> {
  return new AssemblyOrchestrator().assemble(input, options);
}

function resolveStyle(style: CitationStyleName | CitationRenderRule, bibliographyFile?: string): CitationRenderRule {
  return typeof style === 'string' ? getCitationStyle(style, { bibliographyFile }) : style;
}

function toTemplate(input: Template | TemplateSource): Result<Template, TemplateError> {
  if ('declaration' in input) {
    return parseTemplate(input.source, input.declaration, input.name);
  }
  return parseTemplate(
    input.source,
    { name: input.name, contentFormat: input.contentFormat, placeholders: input.placeholders },
    input.name
  );
}

/**
 * Tool request handlers for the MCP server.
 * Each handler validates its arguments, reads inputs through the workspace
 * and delegates to the assembly engine.
 */

import {
  BibliographyIndex,
  CitationResolver,
  SectionSplitter,
  assemble,
  createRunContext,
  getCitationStyle,
  isCitationStyleName,
} from '@manuscript-assembler/core';
import type { CitationStyleName, LoggingService } from '@manuscript-assembler/core';
import type { Config } from './config.js';
import { TemplateLoader } from './services/TemplateLoader.js';
import { WorkspaceFiles } from './services/WorkspaceFiles.js';
import type { ErrorResponse, OutputPaths, SectionOutlineItem } from './types/index.js';
import { createAssemblyFailedError, createProcessingError, isErrorResponse } from './utils/errors.js';
import { checkCitationStyle, checkFlag, checkPath, optionalString, validateArguments } from './utils/validation.js';
import type { ToolArguments } from './utils/validation.js';

export interface Services {
  config: Config;
  files: WorkspaceFiles;
  templates: TemplateLoader;
  logger: LoggingService;
}

export type { ToolArguments };

type ToolHandler = (args: ToolArguments, services: Services) => Promise<unknown>;

export function createServices(config: Config, logger: LoggingService): Services {
  return {
    config,
    files: new WorkspaceFiles(config),
    templates: new TemplateLoader(config.templatesDir, config.workspaceRoot),
    logger,
  };
}

function pickStyle(args: ToolArguments, services: Services): CitationStyleName {
  const requested = optionalString(args.citation_style) ?? services.config.defaultCitationStyle;
  return isCitationStyleName(requested) ? requested : 'numeric';
}

function validateManuscriptAndBibliography(args: ToolArguments): ErrorResponse | null {
  return validateArguments([
    checkPath(args, 'manuscript_path'),
    checkPath(args, 'bibliography_path'),
    checkCitationStyle(args),
  ]);
}

/**
 * Tool handler mapping - maps tool names to engine operations
 */
const toolHandlers: Record<string, ToolHandler> = {
  assemble_manuscript: async (args, s) => {
    const invalid = validateManuscriptAndBibliography(args);
    if (invalid) return invalid;
    const invalidOptions = validateArguments([checkPath(args, 'template', false), checkFlag(args, 'write_output')]);
    if (invalidOptions) return invalidOptions;

    const manuscript = await s.files.readInput('manuscript', String(args.manuscript_path));
    if (isErrorResponse(manuscript)) return manuscript;
    const bibliography = await s.files.readInput('bibliography', String(args.bibliography_path));
    if (isErrorResponse(bibliography)) return bibliography;
    const template = await s.templates.load(optionalString(args.template) ?? s.config.defaultTemplate);
    if (isErrorResponse(template)) return template;

    const citationStyle = pickStyle(args, s);
    const context = createRunContext({ logger: s.logger.child('run') });
    const result = assemble(
      { markdown: manuscript.content, bibliographySource: bibliography.content, template },
      { citationStyle, context, bibliographyFile: s.files.outputBaseName(manuscript.path) }
    );
    if (!result.ok) {
      return createAssemblyFailedError(result.error);
    }

    const assembled = result.value;
    let outputs: OutputPaths | null = null;
    if (args.write_output !== false) {
      try {
        outputs = await s.files.writeOutputs(manuscript.path, assembled.finalDocument, assembled.bibliography);
      } catch (error) {
        return createProcessingError('write assembled outputs', error, { outputDir: s.config.outputDir });
      }
    }

    return {
      runId: context.runId,
      template: template.name,
      citationStyle,
      stages: context.history.map(transition => transition.to),
      warnings: assembled.warnings,
      unresolvedCitations: [...assembled.unresolvedCitations],
      citedKeys: assembled.citedKeys,
      emptyPlaceholders: assembled.emptyPlaceholders,
      sectionsUsed: assembled.sectionsUsed,
      sectionsUnused: assembled.sectionsUnused,
      outputs,
      finalDocument: outputs ? undefined : assembled.finalDocument,
    };
  },

  check_citations: async (args, s) => {
    const invalid = validateManuscriptAndBibliography(args);
    if (invalid) return invalid;

    const manuscript = await s.files.readInput('manuscript', String(args.manuscript_path));
    if (isErrorResponse(manuscript)) return manuscript;
    const bibliography = await s.files.readInput('bibliography', String(args.bibliography_path));
    if (isErrorResponse(bibliography)) return bibliography;

    const built = BibliographyIndex.build(bibliography.content);
    if (!built.ok) {
      return createAssemblyFailedError({ stage: 'BuildingBibliography', error: built.error });
    }

    const sections = new SectionSplitter().split(manuscript.content);
    const resolution = new CitationResolver(built.value, getCitationStyle(pickStyle(args, s))).resolve(sections);

    return {
      bibliographyEntries: built.value.size,
      citedKeys: resolution.citedEntries.map(entry => entry.key),
      unresolvedKeys: [...resolution.unresolvedKeys].sort(),
      warnings: resolution.diagnostics.map(diagnostic => diagnostic.message),
      groups: resolution.sections.flatMap(section =>
        section.citations.map(group => ({
          section: section.heading || '(before first heading)',
          sourceText: group.sourceText,
          keys: group.keys,
          resolved: group.resolved,
          renderedText: group.renderedText,
        }))
      ),
    };
  },

  split_sections: async (args, s) => {
    const invalid = validateArguments([checkPath(args, 'manuscript_path')]);
    if (invalid) return invalid;

    const manuscript = await s.files.readInput('manuscript', String(args.manuscript_path));
    if (isErrorResponse(manuscript)) return manuscript;

    const outline: SectionOutlineItem[] = new SectionSplitter().split(manuscript.content).map(section => ({
      order: section.order,
      kind: section.kind,
      level: section.level,
      heading: section.heading,
      characters: section.rawContent.length,
    }));
    return { sections: outline };
  },

  list_templates: async (_args, s) => ({
    templatesDir: s.config.templatesDir,
    defaultTemplate: s.config.defaultTemplate,
    templates: await s.templates.listTemplates(),
  }),

  check_inputs: async (args, s) => {
    const invalid = validateArguments([
      checkPath(args, 'manuscript_path', false),
      checkPath(args, 'bibliography_path', false),
      checkPath(args, 'template', false),
    ]);
    if (invalid) return invalid;

    const inputs = [
      await s.files.checkInput('manuscript', optionalString(args.manuscript_path)),
      await s.files.checkInput('bibliography', optionalString(args.bibliography_path)),
      await s.files.checkTemplate(s.templates, optionalString(args.template)),
    ];
    return { ready: inputs.every(input => input.valid), inputs };
  },
};

/**
 * Handle tool call requests by delegating to the matching handler
 */
export async function handleToolCall(
  toolName: string,
  args: ToolArguments,
  services: Services
): Promise<unknown> {
  const handler = toolHandlers[toolName];
  if (!handler) {
    throw new Error(`Unknown tool: ${toolName}`);
  }
  services.logger.debug(`Calling tool ${toolName}`);
  return await handler(args, services);
}

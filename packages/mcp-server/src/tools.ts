import { Tool } from '@modelcontextprotocol/sdk/types.js';

/**
 * Shared schema definitions to reduce duplication
 */
const manuscriptPathSchema = {
  type: 'string',
  description: 'Path to the converted manuscript (.md, .markdown or .txt), absolute or relative to the workspace root',
};

const bibliographyPathSchema = {
  type: 'string',
  description: 'Path to the BibTeX bibliography (.bib), absolute or relative to the workspace root',
};

const templateSchema = {
  type: 'string',
  description: 'Optional: Template name from list_templates, or a path to a folder holding template.tex and template.json. Defaults to the configured template',
};

const citationStyleSchema = {
  type: 'string',
  enum: ['numeric', 'natbib', 'biblatex'],
  description: 'Optional: Citation command style. Defaults to the configured style',
};

/**
 * Tool definitions for the MCP server.
 *
 * Each tool defines:
 * - name: Unique tool identifier
 * - description: User-friendly description
 * - inputSchema: JSON Schema for input validation
 */
export const tools: Tool[] = [
  {
    name: 'assemble_manuscript',
    description: 'Assemble a Markdown manuscript and its BibTeX bibliography into a journal LaTeX template. Resolves [@key] citation markers, places sections into template placeholders and writes the .tex file and the cited .bib subset. Returns warnings for unresolved citations, missing required sections and dropped sections.',
    inputSchema: {
      type: 'object',
      properties: {
        manuscript_path: manuscriptPathSchema,
        bibliography_path: bibliographyPathSchema,
        template: templateSchema,
        citation_style: citationStyleSchema,
        write_output: {
          type: 'boolean',
          description: 'Optional: Write the .tex and .bib files to the output directory. Default is true; when false the LaTeX is returned inline',
        },
      },
      required: ['manuscript_path', 'bibliography_path'],
    },
  },
  {
    name: 'check_citations',
    description: 'Check every citation marker in a manuscript against a bibliography without assembling. Lists unresolved keys, cited keys in first-citation order and each citation group with its rendered command.',
    inputSchema: {
      type: 'object',
      properties: {
        manuscript_path: manuscriptPathSchema,
        bibliography_path: bibliographyPathSchema,
        citation_style: citationStyleSchema,
      },
      required: ['manuscript_path', 'bibliography_path'],
    },
  },
  {
    name: 'split_sections',
    description: 'Split a manuscript into its sections and report how each heading was classified (Title, Abstract, Keywords, BodySection, Subsection, References, Other). Use this to see which placeholder each section will fill.',
    inputSchema: {
      type: 'object',
      properties: {
        manuscript_path: manuscriptPathSchema,
      },
      required: ['manuscript_path'],
    },
  },
  {
    name: 'list_templates',
    description: 'List the available journal templates with their placeholder declarations.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'check_inputs',
    description: 'Report whether the manuscript, bibliography and template are present and of an accepted type. Assembly needs all three.',
    inputSchema: {
      type: 'object',
      properties: {
        manuscript_path: manuscriptPathSchema,
        bibliography_path: bibliographyPathSchema,
        template: templateSchema,
      },
    },
  },
];

import * as fs from 'fs/promises';
import * as path from 'path';
import { parseTemplate } from '@manuscript-assembler/core';
import type { TemplateSource } from '@manuscript-assembler/core';
import type { ErrorResponse, TemplateSummary } from '../types/index.js';
import { createFileNotFoundError, createProcessingError } from '../utils/errors.js';

export const TEMPLATE_SOURCE_FILE = 'template.tex';
export const TEMPLATE_DECLARATION_FILE = 'template.json';

/**
 * TemplateLoader reads template folders: a `template.tex` holding the
 * LaTeX with `{{SECTION:name}}` and `{{BIBLIOGRAPHY}}` tokens, and a
 * `template.json` declaring the placeholders.
 *
 * Declarations are returned undecoded; the engine validates them when it
 * merges, so a broken declaration fails the run at the Merging stage.
 */
export class TemplateLoader {
  constructor(
    private readonly templatesDir: string,
    private readonly workspaceRoot: string
  ) {}

  /**
   * Resolve a template reference: a bare name is a folder under the
   * templates directory; anything with a path separator is a folder path
   * relative to the workspace root.
   */
  resolveDirectory(reference: string): string {
    if (path.isAbsolute(reference) || reference.includes('/') || reference.includes(path.sep)) {
      return path.resolve(this.workspaceRoot, reference);
    }
    return path.join(this.templatesDir, reference);
  }

  async load(reference: string): Promise<TemplateSource | ErrorResponse> {
    const directory = this.resolveDirectory(reference);
    const sourcePath = path.join(directory, TEMPLATE_SOURCE_FILE);
    const declarationPath = path.join(directory, TEMPLATE_DECLARATION_FILE);

    for (const required of [sourcePath, declarationPath]) {
      if (!(await isFile(required))) {
        const notFound = createFileNotFoundError(required, 'template');
        const available = await this.listNames();
        if (available.length > 0) {
          notFound.suggestions?.unshift(`Available templates: ${available.join(', ')}`);
        }
        return notFound;
      }
    }

    let declaration: unknown;
    try {
      declaration = JSON.parse(await fs.readFile(declarationPath, 'utf-8'));
    } catch (error) {
      return createProcessingError('load template declaration', error, { path: declarationPath });
    }

    return {
      name: path.basename(directory),
      source: await fs.readFile(sourcePath, 'utf-8'),
      declaration,
    };
  }

  /**
   * Names of the template folders under the templates directory, sorted.
   */
  async listNames(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.templatesDir);
    } catch (error) {
      if (isMissing(error)) {
        return [];
      }
      throw error;
    }

    const names: string[] = [];
    for (const entry of entries.sort()) {
      if (await isFile(path.join(this.templatesDir, entry, TEMPLATE_SOURCE_FILE))) {
        names.push(entry);
      }
    }
    return names;
  }

  /**
   * Summaries of every template, with their validated placeholder lists.
   */
  async listTemplates(): Promise<TemplateSummary[]> {
    const summaries: TemplateSummary[] = [];

    for (const name of await this.listNames()) {
      const directory = path.join(this.templatesDir, name);
      const loaded = await this.load(name);
      if ('error' in loaded) {
        summaries.push({ name, directory, placeholders: [], problem: loaded.message });
        continue;
      }

      const parsed = parseTemplate(loaded.source, loaded.declaration, name);
      if (!parsed.ok) {
        summaries.push({ name, directory, placeholders: [], problem: parsed.error.reason });
        continue;
      }
      summaries.push({
        name: parsed.value.name,
        directory,
        contentFormat: parsed.value.contentFormat,
        placeholders: parsed.value.placeholders,
      });
    }

    return summaries;
  }
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}

export function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

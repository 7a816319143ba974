import * as fs from 'fs/promises';
import * as path from 'path';
import type { Config } from '../config.js';
import type { ErrorResponse, InputFile, InputKind, InputStatus, OutputPaths } from '../types/index.js';
import { createFileNotFoundError, createProcessingError, createValidationError } from '../utils/errors.js';
import { TemplateLoader, isMissing } from './TemplateLoader.js';

type FileInputKind = Exclude<InputKind, 'template'>;

/**
 * Accepted extensions per file input, lower case.
 */
export const INPUT_EXTENSIONS: Readonly<Record<FileInputKind, readonly string[]>> = {
  manuscript: ['.md', '.markdown', '.txt'],
  bibliography: ['.bib'],
};

/**
 * WorkspaceFiles is the server's only contact with the file system for
 * manuscripts, bibliographies and assembled outputs. Relative paths are
 * taken from the workspace root.
 */
export class WorkspaceFiles {
  constructor(private readonly config: Config) {}

  resolve(filePath: string): string {
    return path.resolve(this.config.workspaceRoot, filePath);
  }

  /**
   * Check the extension without touching the disk.
   */
  checkExtension(kind: FileInputKind, filePath: string): string | null {
    const extension = path.extname(filePath).toLowerCase();
    const accepted = INPUT_EXTENSIONS[kind];
    if (accepted.includes(extension)) {
      return null;
    }
    return `${kind} must be a ${accepted.join(', ')} file, got "${path.basename(filePath)}"`;
  }

  async readInput(kind: FileInputKind, filePath: string): Promise<InputFile | ErrorResponse> {
    const problem = this.checkExtension(kind, filePath);
    if (problem) {
      return createValidationError(`${kind}_path`, problem, filePath);
    }

    const absolute = this.resolve(filePath);
    try {
      return { path: absolute, content: await fs.readFile(absolute, 'utf-8') };
    } catch (error) {
      if (isMissing(error)) {
        return createFileNotFoundError(absolute, kind);
      }
      return createProcessingError(`read ${kind}`, error, { path: absolute });
    }
  }

  /**
   * Report whether one input is present and acceptable, without reading it.
   */
  async checkInput(kind: FileInputKind, filePath: string | undefined): Promise<InputStatus> {
    if (filePath === undefined) {
      return { input: kind, path: null, present: false, valid: false, problem: `No ${kind} given` };
    }

    const absolute = this.resolve(filePath);
    let present = false;
    try {
      present = (await fs.stat(absolute)).isFile();
    } catch (error) {
      if (!isMissing(error)) {
        throw error;
      }
    }

    if (!present) {
      return { input: kind, path: absolute, present, valid: false, problem: `${kind} not found` };
    }
    const problem = this.checkExtension(kind, filePath);
    return problem
      ? { input: kind, path: absolute, present, valid: false, problem }
      : { input: kind, path: absolute, present, valid: true };
  }

  async checkTemplate(loader: TemplateLoader, reference: string | undefined): Promise<InputStatus> {
    const name = reference ?? this.config.defaultTemplate;
    const directory = loader.resolveDirectory(name);
    const loaded = await loader.load(name);
    if ('error' in loaded) {
      return {
        input: 'template',
        path: directory,
        present: loaded.error !== 'FILE_NOT_FOUND',
        valid: false,
        problem: loaded.message,
      };
    }
    return { input: 'template', path: directory, present: true, valid: true };
  }

  /**
   * Base name shared by the written .tex and .bib files.
   */
  outputBaseName(manuscriptPath: string): string {
    return path.basename(manuscriptPath, path.extname(manuscriptPath));
  }

  /**
   * Write the assembled LaTeX and the cited BibTeX subset next to each
   * other in the output directory, named after the manuscript.
   */
  async writeOutputs(manuscriptPath: string, latex: string, bibliography: string): Promise<OutputPaths> {
    const outputDir = path.resolve(this.config.workspaceRoot, this.config.outputDir);
    const baseName = this.outputBaseName(manuscriptPath);
    const outputs: OutputPaths = {
      tex: path.join(outputDir, `${baseName}.tex`),
      bib: path.join(outputDir, `${baseName}.bib`),
    };

    await fs.mkdir(outputDir, { recursive: true });
    await fs.writeFile(outputs.tex, latex, 'utf-8');
    await fs.writeFile(outputs.bib, bibliography, 'utf-8');
    return outputs;
  }
}

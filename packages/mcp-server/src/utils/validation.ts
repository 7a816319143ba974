/**
 * Argument checks for the assembler's MCP tools.
 * Each check looks at one named argument and returns a problem or null;
 * `validateArguments` folds the problems into one VALIDATION_ERROR.
 */

import { CITATION_STYLE_NAMES, isCitationStyleName } from '@manuscript-assembler/core';
import type { ErrorResponse } from '../types/index.js';

export type ToolArguments = Record<string, unknown>;

export interface ArgumentProblem {
  field: string;
  message: string;
  value?: unknown;
}

/**
 * A manuscript, bibliography or template path. Blank strings count as missing.
 */
export function checkPath(args: ToolArguments, field: string, required = true): ArgumentProblem | null {
  const value = args[field];
  if (value === undefined || value === null) {
    return required ? { field, message: `${field} is required` } : null;
  }
  if (typeof value !== 'string') {
    return { field, message: `${field} must be a path string`, value };
  }
  if (value.trim() === '') {
    return required ? { field, message: `${field} cannot be empty`, value } : null;
  }
  return null;
}

export function checkFlag(args: ToolArguments, field: string): ArgumentProblem | null {
  const value = args[field];
  if (value === undefined || value === null || typeof value === 'boolean') {
    return null;
  }
  return { field, message: `${field} must be true or false`, value };
}

export function checkCitationStyle(args: ToolArguments, field = 'citation_style'): ArgumentProblem | null {
  const value = args[field];
  if (value === undefined || value === null || (typeof value === 'string' && isCitationStyleName(value))) {
    return null;
  }
  return { field, message: `${field} must be one of: ${CITATION_STYLE_NAMES.join(', ')}`, value };
}

/**
 * Fold argument problems into one response, or null when there are none.
 */
export function validateArguments(checks: ReadonlyArray<ArgumentProblem | null>): ErrorResponse | null {
  const problems = checks.filter((check): check is ArgumentProblem => check !== null);
  if (problems.length === 0) {
    return null;
  }

  return {
    error: 'VALIDATION_ERROR',
    message: problems.length === 1 ? problems[0].message : `${problems.length} invalid arguments`,
    context: { errors: problems },
    suggestions: [
      'Give manuscript_path and bibliography_path relative to the workspace root',
      `Use a citation_style of ${CITATION_STYLE_NAMES.join(', ')}`,
    ],
  };
}

/**
 * Read an optional string argument, treating blanks as absent.
 */
export function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

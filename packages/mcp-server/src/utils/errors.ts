/**
 * Error response formatter for MCP tools
 * Formats all errors as JSON with error type, message, context, and suggestions
 */

import * as path from 'path';
import { describeAssemblyError } from '@manuscript-assembler/core';
import type { AssemblyError } from '@manuscript-assembler/core';
import type { ErrorResponse } from '../types/index.js';

/**
 * Create a file not found error response
 */
export function createFileNotFoundError(
  filePath: string,
  fileType: string = 'file'
): ErrorResponse {
  const suggestions: string[] = [];

  if (fileType === 'manuscript') {
    suggestions.push(
      'Export the manuscript to Markdown (.md) before assembling',
      'Give the path relative to MANUSCRIPT_WORKSPACE_ROOT or as an absolute path'
    );
  } else if (fileType === 'bibliography') {
    suggestions.push(
      'Export the reference library as a BibTeX (.bib) file',
      'Give the path relative to MANUSCRIPT_WORKSPACE_ROOT or as an absolute path'
    );
  } else if (fileType === 'template') {
    suggestions.push(
      'Run list_templates to see the available template names',
      'A template folder needs a template.tex and a template.json',
      'Check TEMPLATES_DIR points at the folder holding your templates'
    );
  } else {
    suggestions.push(
      `Create the ${fileType} at: ${filePath}`,
      'Check the workspace root path is configured correctly',
      'Verify file permissions allow reading'
    );
  }

  return {
    error: 'FILE_NOT_FOUND',
    message: `${fileType} not found: ${path.basename(filePath)}`,
    context: {
      path: filePath,
      fileType,
    },
    suggestions,
  };
}

/**
 * Create a processing error response
 */
export function createProcessingError(
  operation: string,
  error: unknown,
  context?: Record<string, unknown>
): ErrorResponse {
  const errorMessage = error instanceof Error ? error.message : String(error);

  const suggestions: string[] = [];
  if (operation.includes('read') || operation.includes('load')) {
    suggestions.push(
      'Verify the file exists and is readable',
      'Ensure the file encoding is UTF-8'
    );
  } else if (operation.includes('write')) {
    suggestions.push(
      'Check OUTPUT_DIR is writable',
      'Retry with write_output set to false to inspect the result without writing'
    );
  } else {
    suggestions.push(
      'Check the error message for specific details',
      'Try the operation again with different parameters'
    );
  }

  return {
    error: 'PROCESSING_ERROR',
    message: `Failed to ${operation}: ${errorMessage}`,
    context: {
      operation,
      errorDetails: errorMessage,
      ...context,
    },
    suggestions,
  };
}

/**
 * Create an error response for a run that stopped at a pipeline stage
 */
export function createAssemblyFailedError(failure: AssemblyError): ErrorResponse {
  const error = failure.error;
  const context: Record<string, unknown> = { stage: failure.stage, kind: error.kind };
  const suggestions: string[] = [];

  switch (error.kind) {
    case 'ParseError':
      context.line = error.position.line;
      context.column = error.position.column;
      suggestions.push(
        `Fix the bibliography near line ${error.position.line}, column ${error.position.column}`,
        'Check that every entry has balanced braces and a citation key'
      );
      break;
    case 'DuplicateKey':
      context.key = error.key;
      context.line = error.position.line;
      context.firstLine = error.firstPosition.line;
      suggestions.push(
        `Rename or remove one of the entries keyed "${error.key}"`,
        'Re-export the bibliography from the reference manager'
      );
      break;
    case 'TemplateError':
      if (error.placeholder !== undefined) {
        context.placeholder = error.placeholder;
      }
      suggestions.push(
        'Fix the placeholder declarations in template.json',
        'Placeholder kinds are Title, Abstract, Keywords, BodySection, Subsection, References and Other'
      );
      break;
    case 'InternalError':
      suggestions.push('Check the server logs for the stack trace', 'Report the failing inputs');
      break;
  }

  return {
    error: 'ASSEMBLY_FAILED',
    message: describeAssemblyError(failure),
    context,
    suggestions,
  };
}

/**
 * Create a validation error for one parameter
 */
export function createValidationError(
  field: string,
  message: string,
  value?: unknown
): ErrorResponse {
  return {
    error: 'VALIDATION_ERROR',
    message,
    context: {
      field,
      value,
    },
    suggestions: [
      'Check the input parameters match the expected types and formats',
      'Refer to the tool documentation for parameter requirements',
    ],
  };
}

/**
 * Create an error for invalid configuration
 */
export function createConfigurationError(
  configKey: string,
  issue: string
): ErrorResponse {
  return {
    error: 'VALIDATION_ERROR',
    message: `Configuration error: ${configKey} - ${issue}`,
    context: {
      configKey,
      issue,
    },
    suggestions: [
      `Check the ${configKey} configuration value`,
      'Ensure environment variables are set correctly',
      'Restart the server after changing configuration',
    ],
  };
}

/**
 * Check if a value is an ErrorResponse
 */
export function isErrorResponse(value: unknown): value is ErrorResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'error' in value &&
    typeof value.error === 'string' &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

/**
 * Format error response as JSON string
 */
export function formatErrorResponse(error: ErrorResponse): string {
  return JSON.stringify(error, null, 2);
}

/**
 * Safe error handler that never throws
 * Returns ErrorResponse for any error
 */
export function safeErrorHandler(
  error: unknown,
  operation: string,
  context?: Record<string, unknown>
): ErrorResponse {
  if (isErrorResponse(error)) {
    return error;
  }
  return createProcessingError(operation, error, context);
}

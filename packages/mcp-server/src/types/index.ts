import type { PlaceholderSpec, SectionKind, ContentFormat } from '@manuscript-assembler/core';

// ============================================================================
// Error Responses
// ============================================================================

export type ErrorType =
  | 'FILE_NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'PROCESSING_ERROR'
  | 'ASSEMBLY_FAILED';

export interface ErrorResponse {
  error: ErrorType;
  message: string;
  context?: Record<string, unknown>;
  suggestions?: string[];
}

// ============================================================================
// Workspace Inputs
// ============================================================================

export type InputKind = 'manuscript' | 'bibliography' | 'template';

export interface InputFile {
  path: string;                  // Absolute path that was read
  content: string;
}

export interface InputStatus {
  input: InputKind;
  path: string | null;           // Null when the input was not given
  present: boolean;
  valid: boolean;
  problem?: string;
}

export interface OutputPaths {
  tex: string;
  bib: string;
}

// ============================================================================
// Templates
// ============================================================================

export interface TemplateSummary {
  name: string;
  directory: string;
  contentFormat?: ContentFormat;
  placeholders: PlaceholderSpec[];
  problem?: string;              // Set when the declaration does not validate
}

// ============================================================================
// Tool Results
// ============================================================================

export interface SectionOutlineItem {
  order: number;
  kind: SectionKind;
  level: number;
  heading: string;
  characters: number;
}

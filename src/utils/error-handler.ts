/**
 * Centralized error handling utilities
 * Provides consistent error messages for the CLI
 */

import { AnalysisError } from '../analyzers/errors.js';

/**
 * Standard error categories
 */
export enum ErrorCategory {
  FILE_OPERATION = 'File Operation',
  CONFIGURATION = 'Configuration',
  PARSING = 'Parsing',
  ANALYSIS = 'Analysis',
}

/**
 * Hint printed under the error, by category
 */
function getErrorSuggestion(category: ErrorCategory, errorMessage: string): string | null {
  const lowerError = errorMessage.toLowerCase();

  if (category === ErrorCategory.FILE_OPERATION) {
    if (lowerError.includes('enoent') || lowerError.includes('no such file')) {
      return '💡 Suggestion: Check that the project path exists.';
    }
    if (lowerError.includes('eacces') || lowerError.includes('permission denied')) {
      return '💡 Suggestion: Check file permissions on the project directory.';
    }
  }

  if (category === ErrorCategory.CONFIGURATION) {
    return "💡 Suggestion: Fix the value in .modgraph.yaml or run 'modgraph init' to regenerate the template.";
  }

  if (category === ErrorCategory.PARSING && lowerError.includes('wasm')) {
    return '💡 Suggestion: Reinstall dependencies; the tree-sitter grammar file is missing.';
  }

  return null;
}

/**
 * Map an error to the category used for its message
 */
export function categorizeError(error: unknown): ErrorCategory {
  if (error instanceof AnalysisError) {
    switch (error.code) {
      case 'CONFIGURATION_ERROR':
        return ErrorCategory.CONFIGURATION;
      case 'GRAMMAR_LOAD_ERROR':
      case 'FILE_PARSE_ERROR':
        return ErrorCategory.PARSING;
      case 'FILE_READ_ERROR':
        return ErrorCategory.FILE_OPERATION;
      default:
        return ErrorCategory.ANALYSIS;
    }
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string' && error.code.startsWith('E')) {
    return ErrorCategory.FILE_OPERATION;
  }
  return ErrorCategory.ANALYSIS;
}

/**
 * Create a standardized error message
 */
export function createErrorMessage(category: ErrorCategory, operation: string, error: unknown): string {
  const errorMsg = extractErrorMessage(error);
  const baseMessage = `[${category}] ${operation} failed: ${errorMsg}`;

  const suggestion = getErrorSuggestion(category, errorMsg);
  if (suggestion) {
    return `${baseMessage}\n${suggestion}`;
  }

  return baseMessage;
}

/**
 * Extract error message from unknown error type
 */
export function extractErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

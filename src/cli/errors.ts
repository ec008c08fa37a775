/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import {
  ConfigurationError,
  GenerationError,
  StorageError,
  TurnAbortedError,
  isAssistantError,
} from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'CONFIGURATION_ERROR'
  | 'GENERATION_FAILED'
  | 'CACHE_UNAVAILABLE'
  | 'ABORTED'
  | 'INPUT_UNREADABLE'
  | 'INTERNAL_ERROR';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `answer-router help <command>` for usage information.',
  CONFIGURATION_ERROR: 'Check your environment or .env file; `answer-router help` lists the variables.',
  GENERATION_FAILED: 'The model provider may be unavailable. Try again in a moment.',
  CACHE_UNAVAILABLE: 'Check CACHE_DB_PATH, or set CACHE_ENABLED=false to run without a cache.',
  ABORTED: 'The request was cancelled before it completed.',
  INPUT_UNREADABLE: 'Check that the file exists and is readable.',
  INTERNAL_ERROR: 'Re-run with ASSISTANT_DEBUG=true for details.',
};

/** Shown instead of the underlying message when a turn cannot be answered. */
export const GENERATION_FAILED_MESSAGE = 'Could not produce a response, please retry.';

const EXIT_CODES: Record<CliErrorCode, number> = {
  INVALID_ARGUMENT: 2,
  CONFIGURATION_ERROR: 78,
  GENERATION_FAILED: 1,
  CACHE_UNAVAILABLE: 1,
  ABORTED: 130,
  INPUT_UNREADABLE: 66,
  INTERNAL_ERROR: 1,
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/**
 * Map anything thrown by a command onto a CliError.
 */
export function classifyError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (error instanceof GenerationError) {
    return createError('GENERATION_FAILED', GENERATION_FAILED_MESSAGE, { action: error.action });
  }
  if (error instanceof ConfigurationError) {
    return createError('CONFIGURATION_ERROR', error.message, { key: error.configKey });
  }
  if (error instanceof StorageError) {
    return createError('CACHE_UNAVAILABLE', error.message, { operation: error.operation });
  }
  if (error instanceof TurnAbortedError) {
    return createError('ABORTED', error.message, { stage: error.stage });
  }
  if (isAssistantError(error)) {
    return createError('INTERNAL_ERROR', error.message, { code: error.code });
  }
  return createError('INTERNAL_ERROR', getErrorMessage(error));
}

export function formatError(error: unknown): string {
  const cliError = classifyError(error);
  const lines = [`Error [${cliError.code}]: ${cliError.message}`];
  if (cliError.suggestion) {
    lines.push('', `Suggestion: ${cliError.suggestion}`);
  }
  return lines.join('\n');
}

export function formatErrorJson(error: unknown): string {
  const cliError = classifyError(error);
  return JSON.stringify(
    {
      error: {
        code: cliError.code,
        message: cliError.message,
        suggestion: cliError.suggestion,
        details: cliError.details,
      },
    },
    null,
    2,
  );
}

export function getExitCode(error: unknown): number {
  return EXIT_CODES[classifyError(error).code];
}

/**
 * @fileoverview Assistant error hierarchy
 *
 * Every failure the pipeline knows how to recover from (or deliberately
 * surfaces) is a typed subclass of AssistantError.
 */

import type { ActionType } from '../types.js';

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class AssistantError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// STORAGE ERRORS
// ============================================================================

export type StorageOperation = 'open' | 'lookup' | 'store' | 'clear' | 'stats' | 'sweep' | 'migrate';

/**
 * The cache store could not be reached or refused an operation.
 * The pipeline treats this as a cache miss for the current turn.
 */
export class StorageError extends AssistantError {
  readonly code = 'CACHE_UNAVAILABLE';

  constructor(
    readonly operation: StorageOperation,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Cache ${operation} failed: ${message}`);
    this.name = 'StorageError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// PROVIDER ERRORS
// ============================================================================

export type ProviderKind = 'document_search' | 'web_search' | 'safety';
export type ProviderErrorReason =
  | 'timeout'
  | 'rate_limit'
  | 'auth_failed'
  | 'network_error'
  | 'invalid_response'
  | 'unavailable';

export class ProviderError extends AssistantError {
  readonly code = 'PROVIDER_ERROR';

  constructor(
    readonly provider: ProviderKind,
    readonly reason: ProviderErrorReason,
    readonly retryable: boolean,
    message: string,
  ) {
    super(`Provider ${provider} ${reason}: ${message}`);
    this.name = 'ProviderError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        provider: this.provider,
        reason: this.reason,
      },
    };
  }
}

// ============================================================================
// DECISION ERRORS
// ============================================================================

export class DecisionError extends AssistantError {
  readonly code = 'DECISION_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly attempts: number,
    readonly rawOutput?: string,
  ) {
    super(`Routing decision failed after ${attempts} attempt(s): ${message}`);
    this.name = 'DecisionError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        attempts: this.attempts,
        rawOutput: this.rawOutput,
      },
    };
  }
}

// ============================================================================
// GENERATION ERRORS
// ============================================================================

export class GenerationError extends AssistantError {
  readonly code = 'GENERATION_ERROR';
  readonly retryable = true;

  constructor(
    readonly action: ActionType,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Response generation for ${action} failed: ${message}`);
    this.name = 'GenerationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        action: this.action,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends AssistantError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

// ============================================================================
// CANCELLATION
// ============================================================================

export type TurnStage = 'lookup' | 'route' | 'evidence' | 'generate';

/** The caller abandoned the turn before its response was stored. */
export class TurnAbortedError extends AssistantError {
  readonly code = 'TURN_ABORTED';
  readonly retryable = true;

  constructor(readonly stage: TurnStage) {
    super(`Turn abandoned during ${stage}`);
    this.name = 'TurnAbortedError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        stage: this.stage,
      },
    };
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isAssistantError(error: unknown): error is AssistantError {
  return error instanceof AssistantError;
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

export function isDecisionError(error: unknown): error is DecisionError {
  return error instanceof DecisionError;
}

export function isGenerationError(error: unknown): error is GenerationError {
  return error instanceof GenerationError;
}

export function isRetryableError(error: unknown): boolean {
  return isAssistantError(error) && error.retryable;
}

/**
 * @fileoverview Assistant configuration
 *
 * Reads the process environment once, validates it with zod and returns a
 * typed, immutable configuration. Nothing else in the codebase reads
 * `process.env` for settings.
 */

import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { ACTION_VOCABULARY, type ActionType } from '../types.js';

// ============================================================================
// TYPES
// ============================================================================

export type WebSearchBackendKind = 'model' | 'serper';
export type SafetyMode = 'rules' | 'model' | 'both';

export interface AssistantConfig {
  openRouter: {
    apiKey: string | undefined;
    baseUrl: string;
  };
  models: {
    orchestrator: string;
    generator: string;
    search: string;
  };
  webSearch: {
    backend: WebSearchBackendKind;
    serperApiKey: string | undefined;
    timeoutMs: number;
    maxRetries: number;
  };
  knowledgeBaseDir: string;
  cache: {
    enabled: boolean;
    ttlMs: number;
    dbPath: string;
    /** Actions whose responses are never written to the cache */
    skipActions: ActionType[];
  };
  agentType: string;
  safetyMode: SafetyMode;
  debug: boolean;
}

export const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_AGENT_TYPE = 'classic';
/** Reserved for `cache clear --all`; never a valid agent type. */
export const ALL_AGENT_TYPES = 'all';

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// SCHEMA
// ============================================================================

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === '') return fallback;
      if (value === 'true' || value === '1' || value === 'yes') return true;
      if (value === 'false' || value === '0' || value === 'no') return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected true or false, got "${value}"` });
      return z.NEVER;
    });

const integer = (fallback: number, min: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === '') return fallback;
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected an integer >= ${min}, got "${value}"` });
        return z.NEVER;
      }
      return parsed;
    });

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const textWithDefault = (fallback: string) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : fallback));

const actionList = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const items = (value ?? '')
      .split(',')
      .map((item) => item.trim().toLowerCase())
      .filter((item) => item.length > 0);
    const actions: ActionType[] = [];
    for (const item of items) {
      const action = ACTION_VOCABULARY.find((candidate) => candidate === item);
      if (!action) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown action "${item}"` });
        return z.NEVER;
      }
      actions.push(action);
    }
    return actions;
  });

export const EnvSchema = z.object({
  OPENROUTER_API_KEY: optionalText,
  OPENROUTER_BASE_URL: textWithDefault(DEFAULT_BASE_URL).pipe(z.string().url()),
  ORCHESTRATOR_MODEL_NAME: textWithDefault('openai/gpt-4.1-mini'),
  GENERATOR_MODEL_NAME: textWithDefault('openai/gpt-4.1-mini'),
  SEARCH_MODEL_NAME: textWithDefault('perplexity/sonar'),
  SERPER_API_KEY: optionalText,
  WEB_SEARCH_BACKEND: textWithDefault('model').pipe(z.enum(['model', 'serper'])),
  WEB_SEARCH_TIMEOUT_MS: integer(15_000, 1),
  WEB_SEARCH_MAX_RETRIES: integer(2, 0),
  KNOWLEDGE_BASE_DIR: textWithDefault('knowledge_base'),
  CACHE_ENABLED: booleanFlag(true),
  CACHE_TTL_DAYS: integer(30, 0),
  CACHE_DB_PATH: textWithDefault('.answer-router/cache.db'),
  CACHE_SKIP_ACTIONS: actionList,
  AGENT_TYPE: textWithDefault(DEFAULT_AGENT_TYPE)
    .pipe(z.string().max(50))
    .refine((value) => value !== ALL_AGENT_TYPES, { message: `"${ALL_AGENT_TYPES}" is reserved` }),
  SAFETY_MODE: textWithDefault('rules').pipe(z.enum(['rules', 'model', 'both'])),
  ASSISTANT_DEBUG: booleanFlag(false),
});

// ============================================================================
// LOADING
// ============================================================================

/**
 * Validate the environment and build the configuration.
 *
 * @throws ConfigurationError naming the first offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AssistantConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.errors[0];
    const key = issue ? issue.path.join('.') : 'environment';
    throw new ConfigurationError(key, issue?.message ?? 'invalid environment');
  }
  const parsed = result.data;

  if (parsed.WEB_SEARCH_BACKEND === 'serper' && !parsed.SERPER_API_KEY) {
    throw new ConfigurationError('SERPER_API_KEY', 'required when WEB_SEARCH_BACKEND=serper');
  }

  return {
    openRouter: {
      apiKey: parsed.OPENROUTER_API_KEY,
      baseUrl: parsed.OPENROUTER_BASE_URL,
    },
    models: {
      orchestrator: parsed.ORCHESTRATOR_MODEL_NAME,
      generator: parsed.GENERATOR_MODEL_NAME,
      search: parsed.SEARCH_MODEL_NAME,
    },
    webSearch: {
      backend: parsed.WEB_SEARCH_BACKEND,
      serperApiKey: parsed.SERPER_API_KEY,
      timeoutMs: parsed.WEB_SEARCH_TIMEOUT_MS,
      maxRetries: parsed.WEB_SEARCH_MAX_RETRIES,
    },
    knowledgeBaseDir: parsed.KNOWLEDGE_BASE_DIR,
    cache: {
      enabled: parsed.CACHE_ENABLED,
      ttlMs: parsed.CACHE_TTL_DAYS * DAY_MS,
      dbPath: parsed.CACHE_DB_PATH,
      skipActions: parsed.CACHE_SKIP_ACTIONS,
    },
    agentType: parsed.AGENT_TYPE,
    safetyMode: parsed.SAFETY_MODE,
    debug: parsed.ASSISTANT_DEBUG,
  };
}

/**
 * The OpenRouter key is only needed once a model is actually called.
 */
export function requireApiKey(config: AssistantConfig): string {
  if (!config.openRouter.apiKey) {
    throw new ConfigurationError('OPENROUTER_API_KEY', 'not set; add it to the environment or .env');
  }
  return config.openRouter.apiKey;
}

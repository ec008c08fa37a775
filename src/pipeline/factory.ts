/**
 * @fileoverview Pipeline assembly from configuration
 */

import { requireApiKey, type AssistantConfig, type SafetyMode } from '../config/index.js';
import { ConfigurationError, StorageError } from '../core/errors.js';
import { TextGenerator } from '../generation/generator.js';
import { DocumentSearchProvider } from '../knowledge/document_search.js';
import { loadDocuments } from '../knowledge/documents.js';
import { OpenRouterChatClient, type ChatClient } from '../providers/chat_client.js';
import { createEvidenceTable } from '../providers/evidence.js';
import {
  ModelSearchBackend,
  SerperSearchBackend,
  WebSearchProvider,
  type SearchBackend,
} from '../providers/web_search.js';
import { ModelDecisionCapability } from '../routing/decision.js';
import { Router } from '../routing/router.js';
import {
  CompositeSafetyClassifier,
  ModelSafetyClassifier,
  RuleSafetyClassifier,
  loadSafetyRules,
  type SafetyClassifier,
  type SafetyRules,
} from '../safety/classifier.js';
import { openCacheDatabase } from '../storage/database.js';
import { createQueryCache, type QueryCacheStore } from '../storage/query_cache.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { UsageTracker } from '../telemetry/usage_tracker.js';
import { AssistantPipeline } from './pipeline.js';

export interface AssistantOverrides {
  chat?: ChatClient;
  /** `null` runs without a cache */
  cache?: QueryCacheStore | null;
  tracker?: UsageTracker;
  safetyRules?: SafetyRules;
  fetchFn?: typeof fetch;
}

export function createSafetyClassifier(
  mode: SafetyMode,
  deps: { rules: SafetyRules; chat: ChatClient; model: string; tracker?: UsageTracker }
): SafetyClassifier {
  const rules = new RuleSafetyClassifier(deps.rules);
  const model = (): ModelSafetyClassifier =>
    new ModelSafetyClassifier(deps.chat, deps.model, { guidelines: deps.rules.guidelines, tracker: deps.tracker });
  switch (mode) {
    case 'rules':
      return rules;
    case 'model':
      return model();
    case 'both':
      return new CompositeSafetyClassifier([rules, model()]);
  }
}

function createSearchBackend(
  config: AssistantConfig,
  chat: ChatClient,
  tracker: UsageTracker,
  fetchFn?: typeof fetch
): SearchBackend {
  if (config.webSearch.backend === 'model') {
    return new ModelSearchBackend(chat, config.models.search, tracker);
  }
  const apiKey = config.webSearch.serperApiKey;
  if (!apiKey) {
    throw new ConfigurationError('SERPER_API_KEY', 'required when WEB_SEARCH_BACKEND=serper');
  }
  return new SerperSearchBackend({ apiKey, fetchFn, tracker });
}

/**
 * Open the configured cache. A cache that cannot be opened is reported and
 * the pipeline runs without one.
 */
export async function openConfiguredCache(config: AssistantConfig): Promise<QueryCacheStore | undefined> {
  if (!config.cache.enabled) {
    logDebug('[answer-router] cache disabled by configuration');
    return undefined;
  }
  try {
    const db = await openCacheDatabase(config.cache.dbPath);
    return createQueryCache(db, { ttlMs: config.cache.ttlMs });
  } catch (error) {
    if (!(error instanceof StorageError)) throw error;
    logWarning('[answer-router] cache unavailable, continuing without it', { error: error.message });
    return undefined;
  }
}

/**
 * @throws ConfigurationError when a required key or data file is missing or invalid
 */
export async function createAssistantPipeline(
  config: AssistantConfig,
  overrides: AssistantOverrides = {}
): Promise<AssistantPipeline> {
  const tracker = overrides.tracker ?? new UsageTracker();
  const chat =
    overrides.chat ?? new OpenRouterChatClient({ apiKey: requireApiKey(config), baseUrl: config.openRouter.baseUrl });
  const rules = overrides.safetyRules ?? loadSafetyRules();
  const documents = await loadDocuments(config.knowledgeBaseDir);

  const safety = createSafetyClassifier(config.safetyMode, { rules, chat, model: config.models.orchestrator, tracker });
  const decisions = new ModelDecisionCapability(chat, config.models.orchestrator, {
    documents,
    guidelines: rules.guidelines,
    tracker,
  });

  const evidence = createEvidenceTable({
    knowledgeBase: new DocumentSearchProvider(documents),
    webSearch: new WebSearchProvider(createSearchBackend(config, chat, tracker, overrides.fetchFn), {
      timeoutMs: config.webSearch.timeoutMs,
      maxRetries: config.webSearch.maxRetries,
    }),
  });

  const cache = overrides.cache === null ? undefined : (overrides.cache ?? (await openConfiguredCache(config)));

  logDebug('[answer-router] pipeline ready', {
    documents: documents.size,
    safetyMode: config.safetyMode,
    webSearch: config.webSearch.backend,
    cache: cache !== undefined,
  });

  return new AssistantPipeline({
    router: new Router(safety, decisions),
    evidence,
    generator: new TextGenerator(chat, config.models.generator, { guidelines: rules.guidelines, tracker }),
    cache,
    skipActions: config.cache.skipActions,
    agentType: config.agentType,
    tracker,
  });
}

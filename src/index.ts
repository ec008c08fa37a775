/**
 * @fileoverview answer-router - query routing with grounded answers and a shared answer cache
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createAssistantPipeline, loadConfig } from 'answer-router';
 *
 * const pipeline = await createAssistantPipeline(loadConfig());
 * const answer = await pipeline.respond('What is our vacation policy?');
 * pipeline.close();
 * ```
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

// ============================================================================
// PIPELINE
// ============================================================================

export { AssistantPipeline } from './pipeline/pipeline.js';
export type { PipelineOptions, HandleOptions, TurnResult } from './pipeline/pipeline.js';
export { ConversationContext } from './pipeline/conversation.js';
export { createAssistantPipeline, createSafetyClassifier, openConfiguredCache } from './pipeline/factory.js';
export type { AssistantOverrides } from './pipeline/factory.js';

// ============================================================================
// CONFIGURATION & TYPES
// ============================================================================

export { loadConfig, requireApiKey, DEFAULT_AGENT_TYPE, ALL_AGENT_TYPES } from './config/index.js';
export type { AssistantConfig, SafetyMode, WebSearchBackendKind } from './config/index.js';
export { ACTION_VOCABULARY, isActionType, isEvidenceAction } from './types.js';
export type {
  ActionType,
  ChatMessage,
  ConversationView,
  DecisionSource,
  Evidence,
  EvidenceAction,
  EvidenceRequest,
  EvidenceSource,
  RoutingDecision,
} from './types.js';

// ============================================================================
// ERRORS
// ============================================================================

export {
  AssistantError,
  ConfigurationError,
  DecisionError,
  GenerationError,
  ProviderError,
  StorageError,
  TurnAbortedError,
  isAssistantError,
  isRetryableError,
} from './core/errors.js';

// ============================================================================
// COMPONENTS
// ============================================================================

export { normalizeQuery, normalizeQueryText, computeQueryHash } from './query/normalizer.js';
export type { NormalizedQuery } from './query/normalizer.js';
export { Router } from './routing/router.js';
export type { RouterState } from './routing/router.js';
export { ModelDecisionCapability } from './routing/decision.js';
export type { DecisionCapability, DecisionInput } from './routing/decision.js';
export {
  RuleSafetyClassifier,
  ModelSafetyClassifier,
  CompositeSafetyClassifier,
  loadSafetyRules,
} from './safety/classifier.js';
export type { SafetyClassifier, SafetyRules, SafetyVerdict } from './safety/classifier.js';
export { TextGenerator } from './generation/generator.js';
export type { ResponseGenerator, GenerateInput } from './generation/generator.js';
export { createEvidenceTable, IntrinsicProvider } from './providers/evidence.js';
export type { EvidenceProvider, EvidenceTable } from './providers/evidence.js';
export { DocumentSearchProvider } from './knowledge/document_search.js';
export { loadDocuments } from './knowledge/documents.js';
export type { DocumentSet, KnowledgeDocument } from './knowledge/documents.js';
export { WebSearchProvider, ModelSearchBackend, SerperSearchBackend } from './providers/web_search.js';
export type { SearchBackend, WebSearchResult } from './providers/web_search.js';
export { OpenRouterChatClient } from './providers/chat_client.js';
export type { ChatClient, ChatRequest, ChatResponse } from './providers/chat_client.js';

// ============================================================================
// STORAGE & TELEMETRY
// ============================================================================

export { openCacheDatabase } from './storage/database.js';
export { applyMigrations, readAppliedMigrations, SCHEMA_VERSION } from './storage/migrations.js';
export { SqliteQueryCache, InMemoryQueryCache, createQueryCache, createInMemoryQueryCache } from './storage/query_cache.js';
export type { QueryCacheStore, CacheEntry, CacheStats } from './storage/query_cache.js';
export { UsageTracker, formatUsageSummary } from './telemetry/usage_tracker.js';
export type { UsageSummary } from './telemetry/usage_tracker.js';

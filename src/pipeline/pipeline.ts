/**
 * @fileoverview Answer pipeline
 *
 * normalize → cache lookup → route → one evidence provider → generate →
 * cache store → append turn.
 *
 * Only generation failures and aborts reach the caller. A failed routing
 * decision falls back to `intrinsic`; provider failures arrive as not-found
 * evidence; cache failures make the turn a miss and skip the store.
 */

import { ALL_AGENT_TYPES, DEFAULT_AGENT_TYPE } from '../config/index.js';
import { DecisionError, StorageError, TurnAbortedError, type StorageOperation, type TurnStage } from '../core/errors.js';
import type { ResponseGenerator } from '../generation/generator.js';
import { NOT_FOUND_REASONS, notFound, type EvidenceTable } from '../providers/evidence.js';
import { normalizeQuery } from '../query/normalizer.js';
import type { Router } from '../routing/router.js';
import type { CacheEntry, CacheStats, QueryCacheStore } from '../storage/query_cache.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { UsageTracker } from '../telemetry/usage_tracker.js';
import { isEvidenceAction, type ActionType, type Evidence, type RoutingDecision } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import { ConversationContext } from './conversation.js';

// ============================================================================
// TYPES
// ============================================================================

export interface PipelineOptions {
  router: Router;
  evidence: EvidenceTable;
  generator: ResponseGenerator;
  /** Omit to run without a cache */
  cache?: QueryCacheStore;
  /** Actions whose responses are never stored */
  skipActions?: readonly ActionType[];
  agentType?: string;
  tracker?: UsageTracker;
}

export interface HandleOptions {
  agentType?: string;
  /** Defaults to the pipeline's own session context */
  context?: ConversationContext;
  signal?: AbortSignal;
}

export interface TurnResult {
  response: string;
  /** null only for cache rows written before actions were tracked */
  action: ActionType | null;
  decision?: RoutingDecision;
  evidence?: Evidence;
  cached: boolean;
  /** Whether the response was written to the cache */
  stored: boolean;
  normalized: string;
  hashKey: string;
  agentType: string;
}

// ============================================================================
// PIPELINE
// ============================================================================

export class AssistantPipeline {
  readonly context = new ConversationContext();

  private readonly skipActions: ReadonlySet<ActionType>;
  private readonly defaultAgentType: string;
  private fallbacks = 0;
  private cacheFailures = 0;

  constructor(private readonly options: PipelineOptions) {
    this.skipActions = new Set(options.skipActions ?? []);
    this.defaultAgentType = options.agentType ?? DEFAULT_AGENT_TYPE;
  }

  get cacheEnabled(): boolean {
    return this.options.cache !== undefined;
  }

  /** Turns answered with the `intrinsic` fallback after a DecisionError. */
  get fallbackCount(): number {
    return this.fallbacks;
  }

  /** Cache operations that failed and were bypassed. */
  get cacheFailureCount(): number {
    return this.cacheFailures;
  }

  get usage(): UsageTracker | undefined {
    return this.options.tracker;
  }

  async respond(rawQuery: string, options: HandleOptions = {}): Promise<string> {
    const result = await this.handle(rawQuery, options);
    return result.response;
  }

  /**
   * @throws GenerationError when the response cannot be generated
   * @throws TurnAbortedError when `signal` fires before the turn is stored
   */
  async handle(rawQuery: string, options: HandleOptions = {}): Promise<TurnResult> {
    const agentType = options.agentType ?? this.defaultAgentType;
    const context = options.context ?? this.context;
    const { signal } = options;
    const { normalized, hashKey } = normalizeQuery(rawQuery);
    const base = { normalized, hashKey, agentType };

    checkAborted(signal, 'lookup');
    const hit = await this.lookup(hashKey, agentType);
    if (hit) {
      logDebug('[answer-router] cache hit', { hashKey, agentType, hitCount: hit.hitCount });
      context.append(rawQuery.trim(), hit.response);
      return {
        ...base,
        response: hit.response,
        action: hit.routingAction,
        decision: hit.routingAction ? { action: hit.routingAction, rationale: 'cached response', source: 'cache' } : undefined,
        cached: true,
        stored: false,
      };
    }

    checkAborted(signal, 'route');
    const decision = await this.route(normalized, context, signal);

    checkAborted(signal, 'evidence');
    const evidence = await this.fetchEvidence(normalized, decision, signal);

    checkAborted(signal, 'generate');
    let response: string;
    try {
      response = await this.options.generator.generate({ query: normalized, decision, evidence, context, signal });
    } catch (error) {
      checkAborted(signal, 'generate');
      throw error;
    }
    checkAborted(signal, 'generate');

    const stored = await this.store(hashKey, normalized, response, decision.action, agentType);
    context.append(rawQuery.trim(), response);
    logDebug('[answer-router] turn complete', { action: decision.action, source: decision.source, stored });

    return { ...base, response, action: decision.action, decision, evidence, cached: false, stored };
  }

  /**
   * @throws StorageError when the pipeline runs without a cache
   */
  async cacheStats(agentType?: string): Promise<CacheStats> {
    return this.requireCache('stats').stats(agentType);
  }

  /** Delete entries for one agent type, or every entry for `all`. */
  async cacheClear(agentType: string = ALL_AGENT_TYPES): Promise<number> {
    const cache = this.requireCache('clear');
    return cache.clear(agentType === ALL_AGENT_TYPES ? undefined : agentType);
  }

  async cacheSweep(agentType?: string): Promise<number> {
    return this.requireCache('sweep').sweepExpired(agentType);
  }

  close(): void {
    this.options.cache?.close();
  }

  // --------------------------------------------------------------------------

  private requireCache(operation: StorageOperation): QueryCacheStore {
    if (!this.options.cache) {
      throw new StorageError(operation, false, 'Cache is disabled');
    }
    return this.options.cache;
  }

  private async lookup(hashKey: string, agentType: string): Promise<CacheEntry | undefined> {
    const cache = this.options.cache;
    if (!cache) return undefined;
    try {
      return await cache.lookup(hashKey, agentType);
    } catch (error) {
      this.cacheFailures++;
      logWarning('[answer-router] cache lookup failed, treating as miss', { error: getErrorMessage(error) });
      return undefined;
    }
  }

  private async route(query: string, context: ConversationContext, signal?: AbortSignal): Promise<RoutingDecision> {
    try {
      return await this.options.router.route(query, context, { signal });
    } catch (error) {
      checkAborted(signal, 'route');
      if (!(error instanceof DecisionError)) throw error;
      this.fallbacks++;
      logWarning('[answer-router] routing failed, falling back to intrinsic', {
        error: error.message,
        attempts: error.attempts,
      });
      return { action: 'intrinsic', rationale: `fallback: ${error.message}`, source: 'fallback' };
    }
  }

  private async fetchEvidence(query: string, decision: RoutingDecision, signal?: AbortSignal): Promise<Evidence | undefined> {
    const action = decision.action;
    if (!isEvidenceAction(action)) return undefined;
    const provider = this.options.evidence[action];
    try {
      const evidence = await provider.fetch({ query, decision, signal });
      logDebug('[answer-router] evidence', {
        action,
        found: evidence.found,
        reason: evidence.found ? undefined : evidence.reason,
      });
      return evidence;
    } catch (error) {
      logWarning('[answer-router] evidence provider failed', { action, error: getErrorMessage(error) });
      return notFound(action, NOT_FOUND_REASONS.providerFailed);
    }
  }

  private async store(
    hashKey: string,
    normalized: string,
    response: string,
    action: ActionType,
    agentType: string
  ): Promise<boolean> {
    const cache = this.options.cache;
    if (!cache || this.skipActions.has(action)) return false;
    try {
      await cache.store({ hashKey, normalized, response, action, agentType });
      return true;
    } catch (error) {
      this.cacheFailures++;
      logWarning('[answer-router] cache store failed', { error: getErrorMessage(error) });
      return false;
    }
  }
}

function checkAborted(signal: AbortSignal | undefined, stage: TurnStage): void {
  if (signal?.aborted) {
    throw new TurnAbortedError(stage);
  }
}

/**
 * @fileoverview Web search evidence provider
 *
 * Wraps a search backend with a bounded timeout per attempt and bounded
 * retries with exponential backoff. Every failure mode (outage, timeout,
 * empty result) degrades to not-found evidence; nothing here throws into
 * the turn.
 *
 * Backends:
 * - `ModelSearchBackend`: an online search model reached through the chat client
 * - `SerperSearchBackend`: the Serper.dev Google Search JSON API
 */

import { z } from 'zod';
import type { Evidence, EvidenceRequest, EvidenceSource } from '../types.js';
import { ProviderError, type ProviderErrorReason } from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { UsageTracker } from '../telemetry/usage_tracker.js';
import { retryWithBackoff, withTimeout, TimeoutError, type RetryConfig } from '../utils/async.js';
import { getErrorMessage, isTransientError } from '../utils/errors.js';
import { trackUsage, type ChatClient } from './chat_client.js';
import { NOT_FOUND_REASONS, notFound, type EvidenceProvider } from './evidence.js';

// ============================================================================
// TYPES
// ============================================================================

export interface WebSearchResult {
  text: string;
  sources: EvidenceSource[];
}

export interface SearchBackend {
  readonly name: string;
  search(query: string, signal?: AbortSignal): Promise<WebSearchResult>;
}

export interface WebSearchOptions {
  /** Per-attempt timeout in ms (default: 15s) */
  timeoutMs?: number;
  /** Retries after the first attempt (default: 2) */
  maxRetries?: number;
  retry?: Partial<Omit<RetryConfig, 'maxRetries'>>;
  /** Backoff sleep override for tests */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_WEB_SEARCH_TIMEOUT_MS = 15_000;

// ============================================================================
// ERROR CLASSIFICATION
// ============================================================================

function statusOf(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function reasonForStatus(status: number): ProviderErrorReason {
  if (status === 401 || status === 403) return 'auth_failed';
  if (status === 429) return 'rate_limit';
  if (status >= 500) return 'unavailable';
  return 'invalid_response';
}

/**
 * Map a transport failure onto ProviderError. Auth and request errors are
 * not retried; rate limits, outages and transient network errors are.
 */
export function toWebSearchError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  const status = statusOf(error);
  if (status !== undefined) {
    const reason = reasonForStatus(status);
    return new ProviderError('web_search', reason, reason === 'rate_limit' || reason === 'unavailable', getErrorMessage(error));
  }
  return new ProviderError('web_search', 'network_error', true, getErrorMessage(error));
}

function shouldRetry(error: unknown): boolean {
  if (error instanceof TimeoutError) return true;
  if (error instanceof ProviderError) return error.retryable;
  return isTransientError(error);
}

// ============================================================================
// PROVIDER
// ============================================================================

export class WebSearchProvider implements EvidenceProvider {
  readonly action = 'web_search' as const;
  private readonly timeoutMs: number;
  private readonly retryConfig: Partial<RetryConfig>;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(
    private readonly backend: SearchBackend,
    options: WebSearchOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_WEB_SEARCH_TIMEOUT_MS;
    this.retryConfig = { ...options.retry, maxRetries: options.maxRetries ?? 2 };
    this.sleep = options.sleep;
  }

  async fetch(request: EvidenceRequest): Promise<Evidence> {
    const query = request.decision.searchQuery?.trim() || request.query;
    let result: WebSearchResult;
    try {
      result = await retryWithBackoff(
        () => this.searchOnce(query, request.signal),
        {
          config: this.retryConfig,
          shouldRetry,
          sleep: this.sleep,
          signal: request.signal,
          onRetry: (error, attempt, backoffMs) => {
            logWarning('[answer-router] web search retry', {
              backend: this.backend.name,
              attempt,
              backoffMs,
              error: getErrorMessage(error),
            });
          },
        }
      );
    } catch (error) {
      const reason = error instanceof TimeoutError ? NOT_FOUND_REASONS.timedOut : NOT_FOUND_REASONS.providerFailed;
      logWarning('[answer-router] web search unavailable, continuing without evidence', {
        backend: this.backend.name,
        reason,
        error: getErrorMessage(error),
      });
      return notFound(this.action, reason);
    }

    logDebug('[answer-router] web search results', { query, sources: result.sources.length, chars: result.text.length });

    if (result.text.trim().length === 0) {
      return notFound(this.action, NOT_FOUND_REASONS.noResults);
    }
    return { found: true, provider: this.action, text: result.text, sources: result.sources };
  }

  /** One backend call; a timed-out call is aborted before the next attempt starts. */
  private async searchOnce(query: string, parent?: AbortSignal): Promise<WebSearchResult> {
    const controller = new AbortController();
    const signal = parent ? AbortSignal.any([parent, controller.signal]) : controller.signal;
    try {
      return await withTimeout(this.backend.search(query, signal), this.timeoutMs, {
        context: `${this.backend.name} search`,
      });
    } catch (error) {
      if (error instanceof TimeoutError) controller.abort(error);
      throw error;
    }
  }
}

// ============================================================================
// MODEL BACKEND
// ============================================================================

const SEARCH_SYSTEM_PROMPT =
  'You are a helpful search assistant. Provide accurate, up-to-date information with sources when available. ' +
  'Be concise but complete.';

const URL_PATTERN = /https?:\/\/[^\s)\]>"']+/g;

/** URLs cited in free text, in order of first appearance. */
export function extractSources(text: string): EvidenceSource[] {
  const seen = new Set<string>();
  const sources: EvidenceSource[] = [];
  for (const match of text.matchAll(URL_PATTERN)) {
    const url = match[0].replace(/[.,;:]+$/, '');
    if (seen.has(url)) continue;
    seen.add(url);
    let title = url;
    try {
      title = new URL(url).hostname;
    } catch (error) {
      logDebug('[answer-router] unparseable source url', { url, error: getErrorMessage(error) });
    }
    sources.push({ title, location: url });
  }
  return sources;
}

export class ModelSearchBackend implements SearchBackend {
  readonly name = 'model';

  constructor(
    private readonly chat: ChatClient,
    private readonly model: string,
    private readonly tracker?: UsageTracker
  ) {}

  async search(query: string, signal?: AbortSignal): Promise<WebSearchResult> {
    let content: string;
    try {
      const response = await this.chat.complete({
        model: this.model,
        messages: [
          { role: 'system', content: SEARCH_SYSTEM_PROMPT },
          { role: 'user', content: query },
        ],
        signal,
      });
      trackUsage(this.tracker, this.model, response, 'search');
      content = response.content.trim();
    } catch (error) {
      throw toWebSearchError(error);
    }
    return { text: content, sources: extractSources(content) };
  }
}

// ============================================================================
// SERPER BACKEND
// ============================================================================

export const SERPER_ENDPOINT = 'https://google.serper.dev/search';

const SerperResponseSchema = z.object({
  organic: z
    .array(
      z.object({
        title: z.string().optional(),
        snippet: z.string().optional(),
        link: z.string().optional(),
      })
    )
    .optional()
    .default([]),
});

export interface SerperOptions {
  apiKey: string;
  /** Results requested and kept (default: 5) */
  numResults?: number;
  endpoint?: string;
  fetchFn?: typeof fetch;
  tracker?: UsageTracker;
}

export class SerperSearchBackend implements SearchBackend {
  readonly name = 'serper';
  private readonly numResults: number;
  private readonly endpoint: string;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: SerperOptions) {
    this.numResults = options.numResults ?? 5;
    this.endpoint = options.endpoint ?? SERPER_ENDPOINT;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async search(query: string, signal?: AbortSignal): Promise<WebSearchResult> {
    let payload: unknown;
    try {
      const response = await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: {
          'X-API-KEY': this.options.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ q: query, num: this.numResults }),
        signal,
      });
      if (!response.ok) {
        await response.body?.cancel();
        const reason = reasonForStatus(response.status);
        throw new ProviderError(
          'web_search',
          reason,
          reason === 'rate_limit' || reason === 'unavailable',
          `Serper returned HTTP ${response.status}`
        );
      }
      payload = await response.json();
    } catch (error) {
      throw toWebSearchError(error);
    }

    this.options.tracker?.record({ model: 'serper', callType: 'search', inputTokens: 0, outputTokens: 0 });

    const parsed = SerperResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderError('web_search', 'invalid_response', false, parsed.error.message);
    }

    const seen = new Set<string>();
    const lines: string[] = [];
    const sources: EvidenceSource[] = [];
    for (const result of parsed.data.organic) {
      const link = result.link?.trim();
      const snippet = result.snippet?.trim();
      if (!link || !snippet || seen.has(link)) continue;
      seen.add(link);
      const title = result.title?.trim() || link;
      lines.push(`${lines.length + 1}. ${title}\n   ${snippet}\n   ${link}`);
      sources.push({ title, location: link });
      if (sources.length >= this.numResults) break;
    }

    return { text: lines.join('\n'), sources };
  }
}

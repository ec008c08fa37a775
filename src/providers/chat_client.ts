/**
 * @fileoverview Chat completion client
 *
 * The single seam between the assistant and any hosted model. Routing,
 * generation, model-backed search and model-backed safety all go through
 * `ChatClient.complete`; tests substitute a scripted client.
 *
 * @packageDocumentation
 */

import OpenAI from 'openai';
import type { ChatMessage } from '../types.js';
import type { CallType, UsageTracker } from '../telemetry/usage_tracker.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  /** 'json' asks the provider for a single JSON object */
  responseFormat?: 'text' | 'json';
  signal?: AbortSignal;
}

export interface ChatUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface ChatResponse {
  id: string;
  model: string;
  content: string;
  usage: ChatUsage;
  latencyMs: number;
}

export interface ChatClient {
  complete(request: ChatRequest): Promise<ChatResponse>;
}

export interface OpenRouterClientOptions {
  apiKey: string;
  baseUrl: string;
  /** Request timeout in ms (default: 60s) */
  timeoutMs?: number;
}

// ============================================================================
// OPENAI-COMPATIBLE CLIENT
// ============================================================================

function toProviderMessage(message: ChatMessage) {
  switch (message.role) {
    case 'system':
      return { role: 'system' as const, content: message.content };
    case 'user':
      return { role: 'user' as const, content: message.content };
    case 'assistant':
      return { role: 'assistant' as const, content: message.content };
  }
}

/**
 * OpenAI-compatible chat client. Defaults to OpenRouter, which proxies every
 * model family the assistant is configured with.
 */
export class OpenRouterChatClient implements ChatClient {
  private readonly client: OpenAI;

  constructor(options: OpenRouterClientOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? 60_000,
      // Retries are owned by the capability that issues the call.
      maxRetries: 0,
      defaultHeaders: {
        'X-Title': 'answer-router',
      },
    });
  }

  async complete(request: ChatRequest): Promise<ChatResponse> {
    const startedAt = Date.now();
    const completion = await this.client.chat.completions.create(
      {
        model: request.model,
        messages: request.messages.map(toProviderMessage),
        temperature: request.temperature ?? 0,
        max_tokens: request.maxTokens,
        response_format: request.responseFormat === 'json' ? { type: 'json_object' } : undefined,
      },
      { signal: request.signal }
    );

    const inputTokens = completion.usage?.prompt_tokens ?? 0;
    const outputTokens = completion.usage?.completion_tokens ?? 0;
    return {
      id: completion.id,
      model: completion.model,
      content: completion.choices[0]?.message?.content ?? '',
      usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
      latencyMs: Date.now() - startedAt,
    };
  }
}

/**
 * Record a completion against the tracker. Priced by the requested model
 * name, since providers may return a dated variant.
 */
export function trackUsage(
  tracker: UsageTracker | undefined,
  model: string,
  response: ChatResponse,
  callType: CallType
): void {
  tracker?.record({
    model,
    callType,
    inputTokens: response.usage.inputTokens,
    outputTokens: response.usage.outputTokens,
  });
}

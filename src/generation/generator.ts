/**
 * @fileoverview Response generator
 *
 * Turns a routing decision plus optional evidence into the final reply.
 * Evidence-bearing actions answer only from what the provider returned;
 * when the provider came back empty the reply says so instead of guessing.
 */

import { GenerationError } from '../core/errors.js';
import { trackUsage, type ChatClient, type ChatRequest } from '../providers/chat_client.js';
import { formatSafetyGuidelines } from '../safety/classifier.js';
import { logDebug } from '../telemetry/logger.js';
import type { UsageTracker } from '../telemetry/usage_tracker.js';
import type { ActionType, ChatMessage, ConversationView, Evidence, EvidenceSource, RoutingDecision } from '../types.js';
import { getErrorMessage, toError } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface GenerateInput {
  query: string;
  decision: RoutingDecision;
  /** Present for evidence-bearing actions */
  evidence?: Evidence;
  context: ConversationView;
  signal?: AbortSignal;
}

export interface ResponseGenerator {
  /** @throws GenerationError when the text model fails */
  generate(input: GenerateInput): Promise<string>;
}

export interface TextGeneratorOptions {
  guidelines?: readonly string[];
  tracker?: UsageTracker;
  /** History messages included in the prompt (default: 6) */
  contextMessages?: number;
  temperature?: number;
  /** Append a source list to grounded answers (default: true) */
  citeSources?: boolean;
}

// ============================================================================
// FIXED TEXT
// ============================================================================

export const NO_EVIDENCE_RESPONSES: Readonly<Record<'knowledge_base' | 'web_search', string>> = {
  knowledge_base:
    "I couldn't find this in the company documents, so I can't give you a reliable answer. Try naming the policy or procedure you mean.",
  web_search: "I couldn't retrieve current information for this question right now, so I can't give you a reliable answer. Please try again later.",
};

export const DEFAULT_REFUSAL = "I'm sorry, but I can't help with that request.";

const REFUSALS_BY_CATEGORY: Readonly<Record<string, string>> = {
  security_attack: "I'm sorry, but I can't help with gaining unauthorized access to systems or accounts.",
  private_data: "I'm sorry, but I can't share personal or private information about individuals.",
  illegal_activity: "I'm sorry, but I can't help with illegal activities.",
  violence: "I'm sorry, but I can't help with anything that could hurt people.",
};

export const DEFAULT_CLARIFICATION = 'Could you tell me a bit more about what you need?';

const RESPONSE_PROMPT = `You are a helpful company assistant.
Answer the user's question based on the provided context. Be concise but complete.
If the context doesn't contain enough information, say so.
Always keep a professional and friendly tone, and answer in the user's language.

{guidelines}`;

const INTRINSIC_PROMPT = `You are a helpful company assistant.
Answer the user's question from your general knowledge. Be concise but complete.
If you are not sure, say so instead of guessing.

{guidelines}`;

const CLARIFY_PROMPT = `You are a helpful company assistant.
The user's request is too ambiguous to answer. Reply with exactly one short clarifying
question in the user's language and nothing else.`;

// ============================================================================
// HELPERS
// ============================================================================

/** Trimmed text ending in a question mark. */
export function ensureQuestion(text: string): string {
  const trimmed = text.trim();
  if (/^[?.!]*$/.test(trimmed)) return DEFAULT_CLARIFICATION;
  if (trimmed.includes('?')) return trimmed;
  const stripped = trimmed.replace(/[.!]+$/, '');
  return stripped.length === 0 ? DEFAULT_CLARIFICATION : `${stripped}?`;
}

export function isQuestion(text: string | undefined): text is string {
  return text !== undefined && text.trim().endsWith('?');
}

/**
 * Pick the refusal text. The decision's own phrasing is used unless it
 * repeats the query back.
 */
export function refusalFor(decision: RoutingDecision, query: string): string {
  const proposed = decision.refusal?.trim();
  const needle = query.trim().toLowerCase();
  if (proposed && (needle.length === 0 || !proposed.toLowerCase().includes(needle))) {
    return proposed;
  }
  if (decision.safetyCategory) {
    return REFUSALS_BY_CATEGORY[decision.safetyCategory] ?? DEFAULT_REFUSAL;
  }
  return DEFAULT_REFUSAL;
}

export function formatSources(sources: readonly EvidenceSource[]): string {
  const seen = new Set<string>();
  const lines: string[] = [];
  for (const source of sources) {
    const key = `${source.title}\u0000${source.location}`;
    if (seen.has(key)) continue;
    seen.add(key);
    lines.push(`- ${source.title} (${source.location})`);
  }
  return lines.length > 0 ? `Sources:\n${lines.join('\n')}` : '';
}

// ============================================================================
// TEXT GENERATOR
// ============================================================================

export class TextGenerator implements ResponseGenerator {
  private readonly guidelines: readonly string[];
  private readonly contextMessages: number;
  private readonly citeSources: boolean;

  constructor(
    private readonly chat: ChatClient,
    private readonly model: string,
    private readonly options: TextGeneratorOptions = {}
  ) {
    this.guidelines = options.guidelines ?? [];
    this.contextMessages = options.contextMessages ?? 6;
    this.citeSources = options.citeSources ?? true;
  }

  async generate(input: GenerateInput): Promise<string> {
    const { decision } = input;
    switch (decision.action) {
      case 'blocked':
        return refusalFor(decision, input.query);
      case 'clarify':
        return this.clarify(input);
      case 'intrinsic':
        return this.complete(input, this.systemPrompt(INTRINSIC_PROMPT), input.query);
      case 'knowledge_base':
      case 'web_search':
        return this.grounded(input, decision.action);
    }
  }

  private async grounded(input: GenerateInput, action: 'knowledge_base' | 'web_search'): Promise<string> {
    const evidence = input.evidence;
    if (!evidence || !evidence.found) {
      logDebug('[answer-router] no evidence, answering without the model', {
        action,
        reason: evidence && !evidence.found ? evidence.reason : 'missing',
      });
      return NO_EVIDENCE_RESPONSES[action];
    }
    const answer = await this.complete(
      input,
      this.systemPrompt(RESPONSE_PROMPT),
      `Context:\n${evidence.text}\n\nUser question: ${input.query}`
    );
    if (!this.citeSources) return answer;
    const sources = formatSources(evidence.sources);
    return sources ? `${answer}\n\n${sources}` : answer;
  }

  private async clarify(input: GenerateInput): Promise<string> {
    if (isQuestion(input.decision.clarification)) {
      return input.decision.clarification.trim();
    }
    const question = await this.complete(input, CLARIFY_PROMPT, `Ambiguous request: ${input.query}`);
    return ensureQuestion(question);
  }

  private systemPrompt(template: string): string {
    const guidelines = this.guidelines.length > 0 ? formatSafetyGuidelines(this.guidelines) : '';
    return template.replace('{guidelines}', guidelines).trimEnd();
  }

  private async complete(input: GenerateInput, system: string, userContent: string): Promise<string> {
    const action: ActionType = input.decision.action;
    const messages: ChatMessage[] = [
      { role: 'system', content: system },
      ...input.context.recentMessages(this.contextMessages),
      { role: 'user', content: userContent },
    ];
    const request: ChatRequest = {
      model: this.model,
      messages,
      temperature: this.options.temperature ?? 0.3,
      signal: input.signal,
    };

    let content: string;
    try {
      const response = await this.chat.complete(request);
      trackUsage(this.options.tracker, this.model, response, 'generation');
      content = response.content.trim();
    } catch (error) {
      throw new GenerationError(action, getErrorMessage(error), toError(error));
    }
    if (content.length === 0) {
      throw new GenerationError(action, 'model returned an empty response');
    }
    return content;
  }
}

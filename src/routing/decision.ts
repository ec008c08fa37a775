/**
 * @fileoverview Routing decision capability
 *
 * Asks the orchestrator model for a structured routing decision and owns the
 * retry policy around it: each invalid reply is fed back to the model with
 * the validation errors, up to `maxAttempts`. The router only sees the final
 * decision or a DecisionError.
 */

import { z } from 'zod';
import { DecisionError } from '../core/errors.js';
import type { DocumentSet } from '../knowledge/documents.js';
import { describeDocuments } from '../knowledge/documents.js';
import { trackUsage, type ChatClient } from '../providers/chat_client.js';
import { formatSafetyGuidelines } from '../safety/classifier.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { UsageTracker } from '../telemetry/usage_tracker.js';
import type { ActionType, ChatMessage, ConversationView, RoutingDecision } from '../types.js';
import { ACTION_VOCABULARY } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import { validateModelReply } from '../utils/model_reply.js';

// ============================================================================
// TYPES
// ============================================================================

export interface DecisionInput {
  query: string;
  context: ConversationView;
  vocabulary: readonly ActionType[];
  signal?: AbortSignal;
}

export interface DecisionCapability {
  /** @throws DecisionError when no valid decision can be produced */
  decide(input: DecisionInput): Promise<RoutingDecision>;
}

export interface ModelDecisionOptions {
  documents: DocumentSet;
  guidelines: readonly string[];
  tracker?: UsageTracker;
  /** Total model calls before giving up (default: 3) */
  maxAttempts?: number;
  /** History messages included in the prompt (default: 8) */
  contextMessages?: number;
}

// ============================================================================
// SCHEMA
// ============================================================================

/** Older prompts called the intrinsic action `llm_only`. */
const ACTION_ALIASES: Record<string, ActionType> = {
  llm_only: 'intrinsic',
};

export function normalizeActionName(value: string): string {
  const lowered = value.trim().toLowerCase();
  return ACTION_ALIASES[lowered] ?? lowered;
}

const optionalHint = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

export const DecisionOutputSchema = z.object({
  reason: z.string().min(1),
  action: z.preprocess((value) => (typeof value === 'string' ? normalizeActionName(value) : value), z.enum(ACTION_VOCABULARY)),
  document: optionalHint,
  search_query: optionalHint,
  clarification: optionalHint,
  refusal: optionalHint,
});

export type DecisionOutput = z.infer<typeof DecisionOutputSchema>;

type ParseOutcome = { ok: true; output: DecisionOutput } | { ok: false; problems: string[] };

export function parseDecisionOutput(raw: string, vocabulary: readonly ActionType[]): ParseOutcome {
  const result = validateModelReply(raw, DecisionOutputSchema);
  if (!result.ok) return result;
  if (!vocabulary.includes(result.data.action)) {
    return { ok: false, problems: [`action: "${result.data.action}" is not one of ${vocabulary.join(', ')}`] };
  }
  return { ok: true, output: result.data };
}

export function toRoutingDecision(output: DecisionOutput): RoutingDecision {
  const decision: RoutingDecision = { action: output.action, rationale: output.reason, source: 'model' };
  if (output.document) decision.document = output.document;
  if (output.search_query) decision.searchQuery = output.search_query;
  if (output.clarification) decision.clarification = output.clarification;
  if (output.refusal) decision.refusal = output.refusal;
  return decision;
}

// ============================================================================
// PROMPT
// ============================================================================

const ROUTING_PROMPT = `You are a query router for a company assistant.
Decide how to handle user queries.

## Available company documents
{documents}

## Safety guidelines
{guidelines}

## Routing rules
1. knowledge_base: company-specific information (policies, procedures, coding style).
   Set "document" to the exact filename.
2. web_search: current or external information (news, prices, releases, facts that
   change over time). Set "search_query" to an optimized search query.
3. intrinsic: general knowledge that does not change over time and that you know.
4. clarify: the query is ambiguous or too general to answer, including questions about
   the company that do not say what they refer to. Set "clarification" to your question.
5. blocked: the query is harmful under the safety guidelines. Set "refusal" to a polite
   refusal in the user's language.

Prefer knowledge_base for anything about the company.

Reply with one JSON object and nothing else:
{"reason": "<brief explanation>", "action": "{actions}", "document": null, "search_query": null, "clarification": null, "refusal": null}`;

export function buildRoutingPrompt(documents: DocumentSet, guidelines: readonly string[], vocabulary: readonly ActionType[]): string {
  return ROUTING_PROMPT.replace('{documents}', describeDocuments(documents))
    .replace('{guidelines}', formatSafetyGuidelines(guidelines))
    .replace('{actions}', vocabulary.join('" | "'));
}

export function buildRoutingUserContent(query: string, history: readonly ChatMessage[]): string {
  if (history.length === 0) {
    return `Query: ${query}`;
  }
  const lines = history.map((message) => `${message.role === 'user' ? 'User' : 'Assistant'}: ${message.content}`);
  return `Recent conversation:\n${lines.join('\n')}\n\nCurrent query: ${query}`;
}

// ============================================================================
// MODEL CAPABILITY
// ============================================================================

export class ModelDecisionCapability implements DecisionCapability {
  private readonly maxAttempts: number;
  private readonly contextMessages: number;

  constructor(
    private readonly chat: ChatClient,
    private readonly model: string,
    private readonly options: ModelDecisionOptions
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.contextMessages = options.contextMessages ?? 8;
  }

  async decide(input: DecisionInput): Promise<RoutingDecision> {
    const messages: ChatMessage[] = [
      { role: 'system', content: buildRoutingPrompt(this.options.documents, this.options.guidelines, input.vocabulary) },
      { role: 'user', content: buildRoutingUserContent(input.query, input.context.recentMessages(this.contextMessages)) },
    ];
    let lastProblem = 'no attempts made';
    let lastRaw: string | undefined;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      if (input.signal?.aborted) {
        throw new DecisionError('aborted', attempt - 1, lastRaw);
      }

      let raw: string;
      try {
        const response = await this.chat.complete({
          model: this.model,
          messages: [...messages],
          responseFormat: 'json',
          signal: input.signal,
        });
        trackUsage(this.options.tracker, this.model, response, 'routing');
        raw = response.content;
      } catch (error) {
        lastProblem = `model call failed: ${getErrorMessage(error)}`;
        logWarning('[answer-router] routing model call failed', { attempt, error: getErrorMessage(error) });
        continue;
      }

      const outcome = parseDecisionOutput(raw, input.vocabulary);
      if (outcome.ok) {
        const decision = toRoutingDecision(outcome.output);
        logDebug('[answer-router] routing decision', { attempt, action: decision.action, rationale: decision.rationale });
        return decision;
      }

      lastRaw = raw;
      lastProblem = outcome.problems.join('; ');
      logWarning('[answer-router] invalid routing output', { attempt, problems: outcome.problems });
      messages.push(
        { role: 'assistant', content: raw },
        {
          role: 'user',
          content: `Your reply was invalid:\n${outcome.problems.map((problem) => `- ${problem}`).join('\n')}\nReply again with a single JSON object using one of: ${input.vocabulary.join(', ')}.`,
        }
      );
    }

    throw new DecisionError(lastProblem, this.maxAttempts, lastRaw);
  }
}

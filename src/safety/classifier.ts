/**
 * @fileoverview Safety classification
 *
 * Runs before routing. A blocked verdict short-circuits the turn to the
 * `blocked` action; no evidence provider runs for it.
 *
 * - `RuleSafetyClassifier`: pattern rules from safety_rules.yaml
 * - `ModelSafetyClassifier`: zod-validated verdict from the chat model
 * - `CompositeSafetyClassifier`: first blocking verdict wins
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import yaml from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import type { ConversationView } from '../types.js';
import { trackUsage, type ChatClient } from '../providers/chat_client.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { UsageTracker } from '../telemetry/usage_tracker.js';
import { getErrorMessage } from '../utils/errors.js';
import { parseModelReply } from '../utils/model_reply.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SafetyVerdict {
  blocked: boolean;
  category?: string;
  reason?: string;
}

export interface SafetyClassifier {
  classify(query: string, context: ConversationView, signal?: AbortSignal): Promise<SafetyVerdict>;
}

export interface SafetyRule {
  category: string;
  patterns: RegExp[];
}

export interface SafetyRules {
  guidelines: string[];
  rules: SafetyRule[];
}

export const ALLOWED: SafetyVerdict = Object.freeze({ blocked: false });

// ============================================================================
// RULES
// ============================================================================

const SafetyRulesFileSchema = z.object({
  guidelines: z.array(z.string().min(1)),
  rules: z.array(
    z.object({
      category: z.string().min(1),
      patterns: z.array(z.string().min(1)),
    })
  ),
});

export const SAFETY_RULES_PATH = path.join(path.dirname(fileURLToPath(import.meta.url)), 'safety_rules.yaml');

export function parseSafetyRules(raw: unknown): SafetyRules {
  const parsed = SafetyRulesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError('safety_rules', parsed.error.errors[0]?.message ?? 'invalid rules file');
  }
  return {
    guidelines: parsed.data.guidelines,
    rules: parsed.data.rules.map((rule) => ({
      category: rule.category,
      patterns: rule.patterns.map((pattern) => {
        try {
          return new RegExp(pattern, 'i');
        } catch (error) {
          throw new ConfigurationError('safety_rules', `${rule.category}: ${getErrorMessage(error)}`);
        }
      }),
    })),
  };
}

export function loadSafetyRules(filePath: string = SAFETY_RULES_PATH): SafetyRules {
  let raw: unknown;
  try {
    raw = yaml.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError('safety_rules', `${filePath}: ${getErrorMessage(error)}`);
  }
  return parseSafetyRules(raw);
}

/** Guidelines as they appear in routing and generation prompts. */
export function formatSafetyGuidelines(guidelines: readonly string[]): string {
  return ['SAFETY GUIDELINES:', ...guidelines.map((line) => `- ${line}`)].join('\n');
}

export class RuleSafetyClassifier implements SafetyClassifier {
  constructor(private readonly rules: SafetyRules = loadSafetyRules()) {}

  async classify(query: string, _context?: ConversationView, _signal?: AbortSignal): Promise<SafetyVerdict> {
    for (const rule of this.rules.rules) {
      if (rule.patterns.some((pattern) => pattern.test(query))) {
        return { blocked: true, category: rule.category, reason: `matched ${rule.category} rule` };
      }
    }
    return ALLOWED;
  }
}

// ============================================================================
// MODEL
// ============================================================================

const ModelVerdictSchema = z.object({
  blocked: z.boolean(),
  category: z.string().nullish(),
  reason: z.string().nullish(),
});

const MODEL_PROMPT = `You screen user requests for a company assistant.
Decide whether the request below must be refused under these guidelines.

{guidelines}

Answer with a single JSON object:
{"blocked": true|false, "category": "illegal_activity" | "security_attack" | "private_data" | "violence" | "other" | null, "reason": "<one sentence>"}`;

export interface ModelSafetyOptions {
  guidelines?: readonly string[];
  tracker?: UsageTracker;
  /** Prior turns shown to the model (default: 2) */
  contextTurns?: number;
}

/**
 * Model-backed screening. When the model call or its output fails the query
 * is allowed through; the routing model still has `blocked` available.
 */
export class ModelSafetyClassifier implements SafetyClassifier {
  private readonly systemPrompt: string;
  private readonly contextTurns: number;

  constructor(
    private readonly chat: ChatClient,
    private readonly model: string,
    private readonly options: ModelSafetyOptions = {}
  ) {
    const guidelines = options.guidelines ?? loadSafetyRules().guidelines;
    this.systemPrompt = MODEL_PROMPT.replace('{guidelines}', formatSafetyGuidelines(guidelines));
    this.contextTurns = options.contextTurns ?? 2;
  }

  async classify(query: string, context: ConversationView, signal?: AbortSignal): Promise<SafetyVerdict> {
    try {
      const response = await this.chat.complete({
        model: this.model,
        messages: [
          { role: 'system', content: this.systemPrompt },
          ...context.recentMessages(this.contextTurns * 2),
          { role: 'user', content: `Request to screen:\n${query}` },
        ],
        responseFormat: 'json',
        signal,
      });
      trackUsage(this.options.tracker, this.model, response, 'safety');
      const verdict = parseModelReply(response.content, ModelVerdictSchema);
      logDebug('[answer-router] model safety verdict', { blocked: verdict.blocked, category: verdict.category });
      if (!verdict.blocked) return ALLOWED;
      return {
        blocked: true,
        category: verdict.category ?? 'other',
        reason: verdict.reason ?? undefined,
      };
    } catch (error) {
      logWarning('[answer-router] safety model unavailable, allowing query', { error: getErrorMessage(error) });
      return ALLOWED;
    }
  }
}

// ============================================================================
// COMPOSITION
// ============================================================================

export class CompositeSafetyClassifier implements SafetyClassifier {
  constructor(private readonly classifiers: readonly SafetyClassifier[]) {}

  async classify(query: string, context: ConversationView, signal?: AbortSignal): Promise<SafetyVerdict> {
    for (const classifier of this.classifiers) {
      const verdict = await classifier.classify(query, context, signal);
      if (verdict.blocked) return verdict;
    }
    return ALLOWED;
  }
}

/**
 * @fileoverview Query router
 *
 * One transition per turn: received → classifying → decided. Safety runs
 * first and wins; otherwise the decision capability picks exactly one action
 * from the vocabulary. The router never retries and never falls back; a
 * failed decision surfaces as DecisionError for the pipeline to handle.
 */

import { DecisionError } from '../core/errors.js';
import type { SafetyClassifier } from '../safety/classifier.js';
import { logDebug } from '../telemetry/logger.js';
import { ACTION_VOCABULARY, type ActionType, type ConversationView, type RoutingDecision } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import type { DecisionCapability } from './decision.js';

export type RouterState = 'received' | 'classifying' | 'decided';

export interface RouteOptions {
  signal?: AbortSignal;
  /** Observer for state transitions */
  onTransition?: (state: RouterState) => void;
}

export class Router {
  constructor(
    private readonly safety: SafetyClassifier,
    private readonly decisions: DecisionCapability,
    private readonly vocabulary: readonly ActionType[] = ACTION_VOCABULARY
  ) {}

  /**
   * @throws DecisionError when the decision capability cannot produce a valid action
   */
  async route(query: string, context: ConversationView, options: RouteOptions = {}): Promise<RoutingDecision> {
    const transition = (state: RouterState) => {
      logDebug('[answer-router] router state', { state });
      options.onTransition?.(state);
    };

    transition('received');
    transition('classifying');

    const verdict = await this.safety.classify(query, context, options.signal);
    if (verdict.blocked) {
      transition('decided');
      return {
        action: 'blocked',
        rationale: verdict.reason ?? 'blocked by safety classifier',
        source: 'safety',
        safetyCategory: verdict.category,
      };
    }

    let decision: RoutingDecision;
    try {
      decision = await this.decisions.decide({ query, context, vocabulary: this.vocabulary, signal: options.signal });
    } catch (error) {
      if (error instanceof DecisionError) throw error;
      throw new DecisionError(getErrorMessage(error), 1);
    }

    if (!this.vocabulary.includes(decision.action)) {
      throw new DecisionError(`action "${decision.action}" is outside the vocabulary`, 1);
    }

    transition('decided');
    return decision;
  }
}

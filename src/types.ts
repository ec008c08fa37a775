/**
 * @fileoverview Shared domain types for the routing-and-caching pipeline.
 */

// ============================================================================
// ACTIONS
// ============================================================================

/**
 * The closed action vocabulary. Adding an action means extending this list
 * and the evidence table in providers/evidence.ts.
 */
export const ACTION_VOCABULARY = [
  'knowledge_base',
  'web_search',
  'intrinsic',
  'clarify',
  'blocked',
] as const;

export type ActionType = (typeof ACTION_VOCABULARY)[number];

/** Actions answered with evidence from exactly one provider. */
export type EvidenceAction = Extract<ActionType, 'knowledge_base' | 'web_search' | 'intrinsic'>;

export function isActionType(value: unknown): value is ActionType {
  return typeof value === 'string' && (ACTION_VOCABULARY as readonly string[]).includes(value);
}

export function isEvidenceAction(action: ActionType): action is EvidenceAction {
  return action === 'knowledge_base' || action === 'web_search' || action === 'intrinsic';
}

// ============================================================================
// ROUTING
// ============================================================================

/** Who chose the action for a turn. */
export type DecisionSource = 'model' | 'safety' | 'fallback' | 'cache';

export interface RoutingDecision {
  action: ActionType;
  rationale: string;
  source: DecisionSource;
  /** Knowledge-base filename the model picked, if any */
  document?: string;
  /** Rewritten query for web search */
  searchQuery?: string;
  /** Clarifying question proposed by the model */
  clarification?: string;
  /** Refusal phrasing proposed by the model */
  refusal?: string;
  /** Safety category when the safety classifier blocked the query */
  safetyCategory?: string;
}

// ============================================================================
// CONVERSATION
// ============================================================================

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ConversationTurn {
  user: string;
  assistant: string;
}

/**
 * Read-only view of the session history handed to the router and generator.
 * Only the pipeline appends.
 */
export interface ConversationView {
  readonly length: number;
  turns(): readonly ConversationTurn[];
  recentMessages(limit: number): ChatMessage[];
}

// ============================================================================
// EVIDENCE
// ============================================================================

export interface EvidenceSource {
  title: string;
  /** URL for web results, filename for documents */
  location: string;
}

export type Evidence =
  | { found: true; provider: EvidenceAction; text: string; sources: EvidenceSource[] }
  | { found: false; provider: EvidenceAction; reason: string };

export interface EvidenceRequest {
  query: string;
  decision: RoutingDecision;
  signal?: AbortSignal;
}

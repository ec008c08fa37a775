/**
 * @fileoverview Evidence providers and action dispatch
 *
 * Each evidence-bearing action maps to exactly one provider through a closed
 * lookup table. Providers never throw for "nothing found"; they return
 * `{ found: false, reason }` and the generator says so.
 */

import type { EvidenceAction, Evidence, EvidenceRequest } from '../types.js';

export interface EvidenceProvider {
  readonly action: EvidenceAction;
  fetch(request: EvidenceRequest): Promise<Evidence>;
}

export type EvidenceTable = Readonly<Record<EvidenceAction, EvidenceProvider>>;

/** Reasons reported with `found: false` */
export const NOT_FOUND_REASONS = {
  notRequired: 'not_required',
  emptyCorpus: 'empty_corpus',
  noRelevantMatch: 'no_relevant_match',
  noResults: 'no_results',
  providerFailed: 'provider_failed',
  timedOut: 'timed_out',
} as const;

export function notFound(provider: EvidenceAction, reason: string): Evidence {
  return { found: false, provider, reason };
}

/**
 * Answers from the model's own knowledge need no evidence.
 */
export class IntrinsicProvider implements EvidenceProvider {
  readonly action = 'intrinsic' as const;

  async fetch(_request: EvidenceRequest): Promise<Evidence> {
    return notFound('intrinsic', NOT_FOUND_REASONS.notRequired);
  }
}

/**
 * Build the dispatch table. The `action` each provider declares must match
 * the slot it is placed in.
 */
export function createEvidenceTable(providers: {
  knowledgeBase: EvidenceProvider;
  webSearch: EvidenceProvider;
  intrinsic?: EvidenceProvider;
}): EvidenceTable {
  const table: Record<EvidenceAction, EvidenceProvider> = {
    knowledge_base: providers.knowledgeBase,
    web_search: providers.webSearch,
    intrinsic: providers.intrinsic ?? new IntrinsicProvider(),
  };
  for (const [action, provider] of Object.entries(table)) {
    if (provider.action !== action) {
      throw new Error(`Evidence provider for ${action} declares action ${provider.action}`);
    }
  }
  return table;
}

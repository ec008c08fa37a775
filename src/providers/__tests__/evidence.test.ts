import { describe, it, expect } from 'vitest';
import { IntrinsicProvider, NOT_FOUND_REASONS, createEvidenceTable, notFound } from '../evidence.js';
import { trackUsage, type ChatResponse } from '../chat_client.js';
import { UsageTracker } from '../../telemetry/usage_tracker.js';
import { FakeEvidenceProvider } from '../../test/fakes.js';

describe('createEvidenceTable', () => {
  const knowledgeBase = new FakeEvidenceProvider('knowledge_base', notFound('knowledge_base', NOT_FOUND_REASONS.emptyCorpus));
  const webSearch = new FakeEvidenceProvider('web_search', notFound('web_search', NOT_FOUND_REASONS.noResults));

  it('maps each evidence action to its provider', () => {
    const table = createEvidenceTable({ knowledgeBase, webSearch });

    expect(table.knowledge_base).toBe(knowledgeBase);
    expect(table.web_search).toBe(webSearch);
    expect(table.intrinsic).toBeInstanceOf(IntrinsicProvider);
  });

  it('rejects a provider placed in the wrong slot', () => {
    expect(() => createEvidenceTable({ knowledgeBase: webSearch, webSearch })).toThrow(
      'Evidence provider for knowledge_base declares action web_search'
    );
  });
});

describe('IntrinsicProvider', () => {
  it('reports that no evidence is required', async () => {
    const evidence = await new IntrinsicProvider().fetch({
      query: 'what is a monad?',
      decision: { action: 'intrinsic', rationale: 'general knowledge', source: 'model' },
    });

    expect(evidence).toEqual({ found: false, provider: 'intrinsic', reason: 'not_required' });
  });
});

describe('trackUsage', () => {
  const response: ChatResponse = {
    id: 'cmpl-1',
    model: 'openai/gpt-4.1-mini-2025-04-14',
    content: 'ok',
    usage: { inputTokens: 1_000, outputTokens: 500, totalTokens: 1_500 },
    latencyMs: 3,
  };

  it('records usage under the requested model name', () => {
    const tracker = new UsageTracker({ 'openai/gpt-4.1-mini': { input: 0.4, output: 1.6, request: 0 } });

    trackUsage(tracker, 'openai/gpt-4.1-mini', response, 'routing');

    expect(tracker.history()).toEqual([
      { model: 'openai/gpt-4.1-mini', callType: 'routing', inputTokens: 1_000, outputTokens: 500 },
    ]);
    expect(tracker.summary().totalCostUsd).toBe(0.0012);
  });

  it('ignores a missing tracker', () => {
    expect(() => trackUsage(undefined, 'openai/gpt-4.1-mini', response, 'generation')).not.toThrow();
  });
});

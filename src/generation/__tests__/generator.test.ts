import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CLARIFICATION,
  DEFAULT_REFUSAL,
  NO_EVIDENCE_RESPONSES,
  TextGenerator,
  ensureQuestion,
  formatSources,
  refusalFor,
} from '../generator.js';
import { GenerationError } from '../../core/errors.js';
import { ConversationContext } from '../../pipeline/conversation.js';
import { UsageTracker } from '../../telemetry/usage_tracker.js';
import { ScriptedChatClient } from '../../test/fakes.js';
import type { Evidence, RoutingDecision } from '../../types.js';

const MODEL = 'openai/gpt-4.1-mini';

function decision(partial: Partial<RoutingDecision> & Pick<RoutingDecision, 'action'>): RoutingDecision {
  return { rationale: 'test', source: 'model', ...partial };
}

const vacationEvidence: Evidence = {
  found: true,
  provider: 'knowledge_base',
  text: 'From company_policies.md (Vacation Policy):\nFull-time employees get 25 days of paid vacation per year.',
  sources: [{ title: 'Company Policies > Vacation Policy', location: 'company_policies.md' }],
};

describe('ensureQuestion', () => {
  it.each([
    ['Which office do you mean', 'Which office do you mean?'],
    ['Which office do you mean.', 'Which office do you mean?'],
    ['  Which office?  ', 'Which office?'],
    ['', DEFAULT_CLARIFICATION],
    ['?!', DEFAULT_CLARIFICATION],
    ['Which system do you mean? Please name it.', 'Which system do you mean? Please name it.'],
    ['Is it the VPN? Or email!', 'Is it the VPN? Or email!'],
  ])('turns %j into %j', (input, expected) => {
    expect(ensureQuestion(input)).toBe(expected);
  });
});

describe('refusalFor', () => {
  it('uses the category template', () => {
    expect(refusalFor(decision({ action: 'blocked', safetyCategory: 'private_data' }), 'q')).toBe(
      "I'm sorry, but I can't share personal or private information about individuals."
    );
  });

  it('falls back to the default for unknown categories', () => {
    expect(refusalFor(decision({ action: 'blocked', safetyCategory: 'other' }), 'q')).toBe(DEFAULT_REFUSAL);
  });

  it('keeps a proposed refusal that does not repeat the query', () => {
    expect(refusalFor(decision({ action: 'blocked', refusal: 'I cannot help with that.' }), 'steal passwords')).toBe(
      'I cannot help with that.'
    );
  });

  it('drops a proposed refusal that echoes the query', () => {
    const blocked = decision({ action: 'blocked', refusal: 'I will not explain how to steal passwords.' });

    expect(refusalFor(blocked, 'How to STEAL passwords')).toBe(DEFAULT_REFUSAL);
  });
});

describe('formatSources', () => {
  it('lists each source once', () => {
    const source = { title: 'Node.js releases', location: 'https://nodejs.org/en/about/previous-releases' };

    expect(formatSources([source, source])).toBe('Sources:\n- Node.js releases (https://nodejs.org/en/about/previous-releases)');
  });

  it('is empty without sources', () => {
    expect(formatSources([])).toBe('');
  });
});

describe('TextGenerator', () => {
  it('answers from evidence and cites the sources', async () => {
    const chat = new ScriptedChatClient(['You get 25 days of paid vacation per year.']);
    const generator = new TextGenerator(chat, MODEL);

    const response = await generator.generate({
      query: 'how many vacation days do i get?',
      decision: decision({ action: 'knowledge_base', document: 'company_policies.md' }),
      evidence: vacationEvidence,
      context: new ConversationContext(),
    });

    expect(response).toBe(
      'You get 25 days of paid vacation per year.\n\nSources:\n- Company Policies > Vacation Policy (company_policies.md)'
    );
    const messages = chat.requests[0]?.messages ?? [];
    expect(messages).toHaveLength(2);
    expect(messages[1]).toEqual({
      role: 'user',
      content: `Context:\n${vacationEvidence.found ? vacationEvidence.text : ''}\n\nUser question: how many vacation days do i get?`,
    });
  });

  it('omits sources when citing is off', async () => {
    const generator = new TextGenerator(new ScriptedChatClient(['25 days.']), MODEL, { citeSources: false });

    const response = await generator.generate({
      query: 'vacation days?',
      decision: decision({ action: 'knowledge_base' }),
      evidence: vacationEvidence,
      context: new ConversationContext(),
    });

    expect(response).toBe('25 days.');
  });

  it.each(['knowledge_base', 'web_search'] as const)('says so when %s found nothing', async (action) => {
    const chat = new ScriptedChatClient(['should not be used']);
    const generator = new TextGenerator(chat, MODEL);

    const response = await generator.generate({
      query: 'q',
      decision: decision({ action }),
      evidence: { found: false, provider: action, reason: 'no_results' },
      context: new ConversationContext(),
    });

    expect(response).toBe(NO_EVIDENCE_RESPONSES[action]);
    expect(chat.callCount).toBe(0);
  });

  it('answers intrinsic queries directly with history and guidelines', async () => {
    const chat = new ScriptedChatClient(['  A monad wraps values with a bind operation.  ']);
    const context = new ConversationContext();
    context.append('hi', 'Hello! How can I help?');
    const generator = new TextGenerator(chat, MODEL, { guidelines: ['No hacking'] });

    const response = await generator.generate({
      query: 'what is a monad?',
      decision: decision({ action: 'intrinsic' }),
      context,
    });

    expect(response).toBe('A monad wraps values with a bind operation.');
    const request = chat.requests[0];
    expect(request?.temperature).toBe(0.3);
    expect(request?.messages.map((message) => message.role)).toEqual(['system', 'user', 'assistant', 'user']);
    expect(request?.messages[0]?.content).toContain('SAFETY GUIDELINES:\n- No hacking');
    expect(request?.messages[3]?.content).toBe('what is a monad?');
  });

  it('uses the proposed clarification without a model call', async () => {
    const chat = new ScriptedChatClient(['unused']);
    const generator = new TextGenerator(chat, MODEL);

    const response = await generator.generate({
      query: 'how do i get access?',
      decision: decision({ action: 'clarify', clarification: 'Which system do you need access to?' }),
      context: new ConversationContext(),
    });

    expect(response).toBe('Which system do you need access to?');
    expect(chat.callCount).toBe(0);
  });

  it('asks the model for a question when none was proposed', async () => {
    const chat = new ScriptedChatClient(['Which system do you need access to']);
    const generator = new TextGenerator(chat, MODEL);

    const response = await generator.generate({
      query: 'how do i get access?',
      decision: decision({ action: 'clarify', clarification: 'The user should say which system' }),
      context: new ConversationContext(),
    });

    expect(response).toBe('Which system do you need access to?');
    expect(chat.requests[0]?.messages[1]?.content).toBe('Ambiguous request: how do i get access?');
  });

  it('refuses without calling the model', async () => {
    const chat = new ScriptedChatClient(['unused']);
    const generator = new TextGenerator(chat, MODEL);

    const response = await generator.generate({
      query: 'hack the payroll server',
      decision: decision({ action: 'blocked', source: 'safety', safetyCategory: 'security_attack' }),
      context: new ConversationContext(),
    });

    expect(response).toBe("I'm sorry, but I can't help with gaining unauthorized access to systems or accounts.");
    expect(chat.callCount).toBe(0);
  });

  it('wraps model failures in GenerationError', async () => {
    const generator = new TextGenerator(new ScriptedChatClient([new Error('502 bad gateway')]), MODEL);

    const failure = generator.generate({ query: 'q', decision: decision({ action: 'intrinsic' }), context: new ConversationContext() });

    await expect(failure).rejects.toBeInstanceOf(GenerationError);
    await expect(failure).rejects.toMatchObject({
      action: 'intrinsic',
      message: 'Response generation for intrinsic failed: 502 bad gateway',
    });
  });

  it('rejects an empty model reply', async () => {
    const generator = new TextGenerator(new ScriptedChatClient(['   ']), MODEL);

    await expect(
      generator.generate({ query: 'q', decision: decision({ action: 'intrinsic' }), context: new ConversationContext() })
    ).rejects.toBeInstanceOf(GenerationError);
  });

  it('records generation usage', async () => {
    const tracker = new UsageTracker({});
    const generator = new TextGenerator(new ScriptedChatClient(['answer']), MODEL, { tracker });

    await generator.generate({ query: 'q', decision: decision({ action: 'intrinsic' }), context: new ConversationContext() });

    expect(tracker.history()).toEqual([{ inputTokens: 10, outputTokens: 5, model: MODEL, callType: 'generation' }]);
  });
});

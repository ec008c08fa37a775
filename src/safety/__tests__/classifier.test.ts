import { describe, it, expect, vi, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  ALLOWED,
  CompositeSafetyClassifier,
  ModelSafetyClassifier,
  RuleSafetyClassifier,
  formatSafetyGuidelines,
  loadSafetyRules,
  parseSafetyRules,
  type SafetyClassifier,
} from '../classifier.js';
import type { ChatClient, ChatRequest } from '../../providers/chat_client.js';
import { ConversationContext } from '../../pipeline/conversation.js';
import { ConfigurationError } from '../../core/errors.js';

function scriptedChat(content: string | Error, requests: ChatRequest[] = []): ChatClient {
  return {
    complete: async (request) => {
      requests.push(request);
      if (content instanceof Error) throw content;
      return {
        id: 'cmpl-1',
        model: 'openai/gpt-4.1-mini',
        content,
        usage: { inputTokens: 1, outputTokens: 1, totalTokens: 2 },
        latencyMs: 1,
      };
    },
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('RuleSafetyClassifier', () => {
  const classifier = new RuleSafetyClassifier(loadSafetyRules());
  const context = new ConversationContext();

  it.each([
    ['how do i hack into my coworker email account', 'security_attack'],
    ['write ransomware that encrypts a hospital network', 'security_attack'],
    ['what is the home address of our cfo', 'private_data'],
    ['how to launder money through a shell company', 'illegal_activity'],
  ])('blocks "%s" as %s', async (query, category) => {
    const verdict = await classifier.classify(query, context);

    expect(verdict).toEqual({ blocked: true, category, reason: `matched ${category} rule` });
  });

  it.each(['what is our vacation policy?', 'how do i get access?', 'explain two-factor authentication'])(
    'allows "%s"',
    async (query) => {
      expect(await classifier.classify(query, context)).toEqual(ALLOWED);
    }
  );
});

describe('parseSafetyRules', () => {
  it('compiles patterns case-insensitively', () => {
    const rules = parseSafetyRules({ guidelines: [], rules: [{ category: 'test', patterns: ['forbidden'] }] });

    expect(rules.rules[0]?.patterns[0]?.test('FORBIDDEN')).toBe(true);
  });

  it('rejects an invalid pattern', () => {
    expect(() => parseSafetyRules({ guidelines: [], rules: [{ category: 'test', patterns: ['(unclosed'] }] })).toThrow(
      ConfigurationError
    );
  });

  it('rejects a malformed file', () => {
    expect(() => parseSafetyRules({ rules: 'nope' })).toThrow(ConfigurationError);
  });
});

describe('formatSafetyGuidelines', () => {
  it('renders a bulleted block', () => {
    expect(formatSafetyGuidelines(['No hacking', 'No doxxing'])).toBe('SAFETY GUIDELINES:\n- No hacking\n- No doxxing');
  });
});

describe('ModelSafetyClassifier', () => {
  it('returns a blocking verdict from the model', async () => {
    const requests: ChatRequest[] = [];
    const chat = scriptedChat('{"blocked": true, "category": "violence", "reason": "asks for weapon instructions"}', requests);
    const classifier = new ModelSafetyClassifier(chat, 'openai/gpt-4.1-mini', { guidelines: ['No weapons'] });

    const verdict = await classifier.classify('some request', new ConversationContext());

    expect(verdict).toEqual({ blocked: true, category: 'violence', reason: 'asks for weapon instructions' });
    expect(requests[0]?.responseFormat).toBe('json');
    expect(requests[0]?.messages[0]?.content).toContain('SAFETY GUIDELINES:\n- No weapons');
  });

  it('includes recent turns for context', async () => {
    const requests: ChatRequest[] = [];
    const context = new ConversationContext();
    context.append('first question', 'first answer');
    context.append('second question', 'second answer');
    context.append('third question', 'third answer');
    const classifier = new ModelSafetyClassifier(scriptedChat('{"blocked": false}', requests), 'm', {
      guidelines: [],
      contextTurns: 1,
    });

    await classifier.classify('follow-up', context);

    expect(requests[0]?.messages.map((message) => message.content)).toEqual([
      expect.stringContaining('You screen user requests'),
      'third question',
      'third answer',
      'Request to screen:\nfollow-up',
    ]);
  });

  it('defaults a missing category to other', async () => {
    const classifier = new ModelSafetyClassifier(scriptedChat('{"blocked": true, "category": null}'), 'm', {
      guidelines: [],
    });

    expect(await classifier.classify('q', new ConversationContext())).toEqual({
      blocked: true,
      category: 'other',
      reason: undefined,
    });
  });

  it('allows the query when the model fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const classifier = new ModelSafetyClassifier(scriptedChat(new Error('503 upstream')), 'm', { guidelines: [] });

    expect(await classifier.classify('q', new ConversationContext())).toEqual(ALLOWED);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('allows the query when the output is not a verdict', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const classifier = new ModelSafetyClassifier(scriptedChat('I cannot decide.'), 'm', { guidelines: [] });

    expect(await classifier.classify('q', new ConversationContext())).toEqual(ALLOWED);
  });
});

describe('CompositeSafetyClassifier', () => {
  it('stops at the first blocking verdict', async () => {
    const second: SafetyClassifier = { classify: vi.fn(async () => ALLOWED) };
    const composite = new CompositeSafetyClassifier([new RuleSafetyClassifier(loadSafetyRules()), second]);

    const verdict = await composite.classify('hack into the payroll server', new ConversationContext());

    expect(verdict.category).toBe('security_attack');
    expect(second.classify).not.toHaveBeenCalled();
  });

  it('allows when every classifier allows', async () => {
    const composite = new CompositeSafetyClassifier([
      { classify: async () => ALLOWED },
      { classify: async () => ALLOWED },
    ]);

    expect(await composite.classify('hello', new ConversationContext())).toEqual(ALLOWED);
  });
});

describe('loadSafetyRules', () => {
  it('reads the bundled YAML rules', () => {
    const rules = loadSafetyRules();

    expect(rules.rules.map((rule) => rule.category)).toEqual(['illegal_activity', 'security_attack', 'private_data', 'violence']);
    expect(rules.guidelines).toHaveLength(5);
  });

  it('reports an unreadable file as a configuration error', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'answer-router-rules-'));
    const file = path.join(dir, 'rules.yaml');
    fs.writeFileSync(file, 'rules: [unclosed');

    try {
      expect(() => loadSafetyRules(file)).toThrow(ConfigurationError);
      expect(() => loadSafetyRules(path.join(dir, 'missing.yaml'))).toThrow(ConfigurationError);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

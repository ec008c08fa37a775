import { describe, it, expect } from 'vitest';
import {
  DocumentSearchProvider,
  rankSections,
  scoreSection,
  splitSections,
  tokenize,
} from '../document_search.js';
import { displayNameFor, type KnowledgeDocument } from '../documents.js';
import type { RoutingDecision } from '../../types.js';

// ============================================================================
// FIXTURES
// ============================================================================

function makeDocument(filename: string, content: string): KnowledgeDocument {
  return { name: displayNameFor(filename), filename, content, summary: '' };
}

const PROCEDURES = makeDocument(
  'company_procedures.md',
  [
    '# Company Procedures',
    'Intro line.',
    '',
    '## Vacation Policy',
    '',
    'Full-time employees accrue 25 days of paid vacation per year.',
    '',
    '## Sick Leave',
    'Notify your manager before 10:00 on the first day of absence.',
  ].join('\n')
);

const POLICIES = makeDocument(
  'company_policies.md',
  ['# Company Policies', '## Remote Work', 'Employees may work remotely up to four days per week.'].join('\n')
);

const documents = new Map([
  [PROCEDURES.filename, PROCEDURES],
  [POLICIES.filename, POLICIES],
]);

function decision(overrides: Partial<RoutingDecision> = {}): RoutingDecision {
  return { action: 'knowledge_base', rationale: 'company policy question', source: 'model', ...overrides };
}

// ============================================================================
// SCORING
// ============================================================================

describe('tokenize', () => {
  it('drops stop words and short tokens', () => {
    expect(tokenize('What is our vacation policy?')).toEqual(['vacation', 'policy']);
  });
});

describe('splitSections', () => {
  it('splits on headings and drops empty sections', () => {
    const sections = splitSections(PROCEDURES);

    expect(sections.map((section) => section.heading)).toEqual(['Company Procedures', 'Vacation Policy', 'Sick Leave']);
    expect(sections[1]?.body).toBe('Full-time employees accrue 25 days of paid vacation per year.');
  });

  it('titles leading text with the document name', () => {
    const [section] = splitSections(makeDocument('faq.md', 'No headings here.'));

    expect(section?.heading).toBe('Faq');
  });
});

describe('scoreSection', () => {
  const [, vacation, sick] = splitSections(PROCEDURES);

  it('scores heading matches highest', () => {
    expect(vacation && scoreSection(['vacation', 'policy'], vacation)).toBe(1);
  });

  it('scores a single body match', () => {
    const body = { document: PROCEDURES, heading: 'Time Off', body: 'Vacation days are tracked in the portal.' };

    expect(scoreSection(['vacation'], body)).toBeCloseTo(1 / 2.4, 10);
  });

  it('scores unrelated sections as zero', () => {
    expect(sick && scoreSection(['vacation', 'policy'], sick)).toBe(0);
  });

  it('returns zero for an empty query', () => {
    expect(sick && scoreSection([], sick)).toBe(0);
  });
});

describe('rankSections', () => {
  it('keeps only sections above the floor, best first', () => {
    const ranked = rankSections('vacation policy', documents.values());

    expect(ranked.map((section) => section.heading)).toEqual(['Vacation Policy']);
  });
});

// ============================================================================
// PROVIDER
// ============================================================================

describe('DocumentSearchProvider', () => {
  it('returns the best excerpt with its source', async () => {
    const provider = new DocumentSearchProvider(documents);

    const evidence = await provider.fetch({ query: 'what is our vacation policy?', decision: decision() });

    expect(evidence).toEqual({
      found: true,
      provider: 'knowledge_base',
      text: 'From company_procedures.md (Vacation Policy):\nFull-time employees accrue 25 days of paid vacation per year.',
      sources: [{ title: 'Company Procedures > Vacation Policy', location: 'company_procedures.md' }],
    });
  });

  it('reports no relevant match below the floor', async () => {
    const provider = new DocumentSearchProvider(documents);

    const evidence = await provider.fetch({ query: 'quantum chromodynamics', decision: decision() });

    expect(evidence).toEqual({ found: false, provider: 'knowledge_base', reason: 'no_relevant_match' });
  });

  it('reports an empty corpus as not found', async () => {
    const provider = new DocumentSearchProvider(new Map());

    const evidence = await provider.fetch({ query: 'vacation policy', decision: decision() });

    expect(evidence).toEqual({ found: false, provider: 'knowledge_base', reason: 'empty_corpus' });
  });

  it('searches the hinted document first', async () => {
    const provider = new DocumentSearchProvider(documents);

    const evidence = await provider.fetch({
      query: 'remote work',
      decision: decision({ document: 'company_policies.md' }),
    });

    expect(evidence.found && evidence.sources).toEqual([
      { title: 'Company Policies > Remote Work', location: 'company_policies.md' },
    ]);
  });

  it('falls back to every document when the hinted one has no match', async () => {
    const provider = new DocumentSearchProvider(documents);

    const evidence = await provider.fetch({
      query: 'remote work',
      decision: decision({ document: 'company_procedures.md' }),
    });

    expect(evidence.found && evidence.sources[0]?.location).toBe('company_policies.md');
  });

  it('caps the number and length of excerpts', async () => {
    const long = makeDocument(
      'handbook.md',
      ['## Leave one', 'leave '.repeat(50), '## Leave two', 'leave', '## Leave three', 'leave'].join('\n')
    );
    const provider = new DocumentSearchProvider(new Map([[long.filename, long]]), {
      maxExcerpts: 2,
      maxExcerptChars: 20,
    });

    const evidence = await provider.fetch({ query: 'leave', decision: decision() });

    expect(evidence.found && evidence.sources.map((source) => source.title)).toEqual([
      'Handbook > Leave one',
      'Handbook > Leave two',
    ]);
    expect(evidence.found && evidence.text.split('\n---\n')[0]).toBe(
      'From handbook.md (Leave one):\nleave leave leave le...\n'
    );
  });
});

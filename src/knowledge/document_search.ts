/**
 * @fileoverview Lexical document search
 *
 * Splits each knowledge-base document into heading-delimited sections and
 * scores them against the query by weighted term location:
 * - Section heading match: 3.0
 * - Document name match: 2.0
 * - Section body match: 1.0
 *
 * Scores are normalized to 0-1. Sections below the relevance floor are
 * dropped; the best few are returned as excerpts with their source file.
 */

import type { Evidence, EvidenceRequest, EvidenceSource } from '../types.js';
import { NOT_FOUND_REASONS, notFound, type EvidenceProvider } from '../providers/evidence.js';
import { logDebug } from '../telemetry/logger.js';
import type { DocumentSet, KnowledgeDocument } from './documents.js';

// ============================================================================
// TYPES
// ============================================================================

export interface DocumentSection {
  document: KnowledgeDocument;
  heading: string;
  body: string;
}

export interface ScoredSection extends DocumentSection {
  score: number;
}

export interface DocumentSearchOptions {
  /** Minimum normalized score for a section to count (default: 0.2) */
  relevanceFloor?: number;
  /** Maximum excerpts returned (default: 3) */
  maxExcerpts?: number;
  /** Per-excerpt character cap (default: 1500) */
  maxExcerptChars?: number;
}

export const DEFAULT_RELEVANCE_FLOOR = 0.2;
export const DEFAULT_MAX_EXCERPTS = 3;
const DEFAULT_MAX_EXCERPT_CHARS = 1500;

const STOP_WORDS = new Set([
  'the', 'and', 'for', 'are', 'but', 'not', 'you', 'all', 'any', 'can', 'our', 'out',
  'was', 'what', 'when', 'where', 'which', 'who', 'how', 'why', 'with', 'this', 'that',
  'from', 'have', 'has', 'does', 'about', 'your', 'there', 'their', 'into', 'its',
]);

// ============================================================================
// SCORING
// ============================================================================

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((word) => word.length > 2 && !STOP_WORDS.has(word));
}

/**
 * Split markdown on headings. Text before the first heading becomes a
 * section titled with the document name.
 */
export function splitSections(document: KnowledgeDocument): DocumentSection[] {
  const sections: DocumentSection[] = [];
  let heading = document.name;
  let body: string[] = [];

  const flush = () => {
    const text = body.join('\n').trim();
    if (text.length > 0) {
      sections.push({ document, heading, body: text });
    }
  };

  for (const line of document.content.split('\n')) {
    const match = /^#{1,6}\s+(.+?)\s*#*\s*$/.exec(line);
    if (match?.[1]) {
      flush();
      heading = match[1];
      body = [];
    } else {
      body.push(line);
    }
  }
  flush();
  return sections;
}

export function scoreSection(queryTerms: readonly string[], section: DocumentSection): number {
  const terms = Array.from(new Set(queryTerms));
  if (terms.length === 0) return 0;

  const headingWords = new Set(tokenize(section.heading));
  const nameWords = new Set(tokenize(section.document.name));
  const bodyWords = new Set(tokenize(section.body));
  const total = Math.max(2, Math.min(terms.length, 20));

  let matches = 0;
  for (const term of terms) {
    if (headingWords.has(term)) {
      matches += 3.0;
    } else if (nameWords.has(term)) {
      matches += 2.0;
    } else if (bodyWords.has(term)) {
      matches += 1.0;
    }
  }
  return Math.min(1, matches / (total * 1.2));
}

export function rankSections(
  query: string,
  documents: Iterable<KnowledgeDocument>,
  relevanceFloor: number = DEFAULT_RELEVANCE_FLOOR
): ScoredSection[] {
  const terms = tokenize(query);
  const scored: ScoredSection[] = [];
  for (const document of documents) {
    for (const section of splitSections(document)) {
      const score = scoreSection(terms, section);
      if (score >= relevanceFloor) {
        scored.push({ ...section, score });
      }
    }
  }
  return scored.sort((a, b) => b.score - a.score);
}

// ============================================================================
// PROVIDER
// ============================================================================

export class DocumentSearchProvider implements EvidenceProvider {
  readonly action = 'knowledge_base' as const;
  private readonly relevanceFloor: number;
  private readonly maxExcerpts: number;
  private readonly maxExcerptChars: number;

  constructor(
    private readonly documents: DocumentSet,
    options: DocumentSearchOptions = {}
  ) {
    this.relevanceFloor = options.relevanceFloor ?? DEFAULT_RELEVANCE_FLOOR;
    this.maxExcerpts = options.maxExcerpts ?? DEFAULT_MAX_EXCERPTS;
    this.maxExcerptChars = options.maxExcerptChars ?? DEFAULT_MAX_EXCERPT_CHARS;
  }

  async fetch(request: EvidenceRequest): Promise<Evidence> {
    if (this.documents.size === 0) {
      return notFound(this.action, NOT_FOUND_REASONS.emptyCorpus);
    }

    const hinted = request.decision.document ? this.documents.get(request.decision.document) : undefined;
    let ranked = hinted ? rankSections(request.query, [hinted], this.relevanceFloor) : [];
    if (ranked.length === 0) {
      ranked = rankSections(request.query, this.documents.values(), this.relevanceFloor);
    }

    logDebug('[answer-router] document search', {
      query: request.query,
      hint: request.decision.document,
      matches: ranked.length,
      top: ranked[0] ? `${ranked[0].document.filename}#${ranked[0].heading} (${ranked[0].score.toFixed(2)})` : undefined,
    });

    if (ranked.length === 0) {
      return notFound(this.action, NOT_FOUND_REASONS.noRelevantMatch);
    }

    const excerpts = ranked.slice(0, this.maxExcerpts);
    const sources: EvidenceSource[] = [];
    for (const excerpt of excerpts) {
      const title = `${excerpt.document.name} > ${excerpt.heading}`;
      if (!sources.some((source) => source.title === title)) {
        sources.push({ title, location: excerpt.document.filename });
      }
    }

    return {
      found: true,
      provider: this.action,
      text: excerpts.map((excerpt) => this.formatExcerpt(excerpt)).join('\n\n---\n\n'),
      sources,
    };
  }

  private formatExcerpt(section: ScoredSection): string {
    const body =
      section.body.length > this.maxExcerptChars
        ? `${section.body.slice(0, this.maxExcerptChars).trimEnd()}...`
        : section.body;
    return `From ${section.document.filename} (${section.heading}):\n${body}`;
  }
}

/**
 * @fileoverview Knowledge base loading
 *
 * The knowledge base is a flat directory of markdown files. An optional
 * `summaries.json` beside them maps filename → one-line summary used in the
 * routing prompt.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { z } from 'zod';
import { logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

export interface KnowledgeDocument {
  /** Display name derived from the file stem */
  name: string;
  filename: string;
  content: string;
  summary: string;
}

/** Keyed by filename, in filename order */
export type DocumentSet = ReadonlyMap<string, KnowledgeDocument>;

export const SUMMARIES_FILE = 'summaries.json';
const MAX_FALLBACK_SUMMARY_CHARS = 240;

const SummariesSchema = z.record(z.string().min(1));

export function displayNameFor(filename: string): string {
  return path
    .basename(filename, path.extname(filename))
    .split(/[_-]+/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join(' ');
}

/**
 * First paragraph of body text, skipping headings, rules and front matter.
 */
export function firstParagraph(content: string): string {
  const paragraphs = content.split(/\n\s*\n/);
  for (const paragraph of paragraphs) {
    const lines = paragraph
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith('#') && !/^[-*_=]{3,}$/.test(line));
    if (lines.length === 0) continue;
    const text = lines.join(' ');
    return text.length > MAX_FALLBACK_SUMMARY_CHARS
      ? `${text.slice(0, MAX_FALLBACK_SUMMARY_CHARS - 3).trimEnd()}...`
      : text;
  }
  return '';
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readSummaries(dir: string): Promise<Record<string, string>> {
  const file = path.join(dir, SUMMARIES_FILE);
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (error) {
    if (!isMissingFile(error)) {
      logWarning('[answer-router] document summaries unreadable', { file, error: getErrorMessage(error) });
    }
    return {};
  }
  try {
    return SummariesSchema.parse(JSON.parse(raw));
  } catch (error) {
    logWarning('[answer-router] ignoring malformed document summaries', { file, error: getErrorMessage(error) });
    return {};
  }
}

/**
 * Load every `*.md` file in `dir`. A missing directory yields an empty set;
 * the document search provider then reports not-found for every query.
 */
export async function loadDocuments(dir: string): Promise<DocumentSet> {
  const isDirectory = await fs.stat(dir).then(
    (stat) => stat.isDirectory(),
    () => false
  );
  if (!isDirectory) {
    logWarning('[answer-router] knowledge base directory not found', { dir });
    return new Map();
  }

  const entries = await glob('*.md', { cwd: dir, nodir: true, nocase: true });
  const summaries = await readSummaries(dir);
  const documents = new Map<string, KnowledgeDocument>();

  for (const filename of entries.sort()) {
    const content = await fs.readFile(path.join(dir, filename), 'utf8');
    documents.set(filename, {
      name: displayNameFor(filename),
      filename,
      content,
      summary: summaries[filename] ?? firstParagraph(content),
    });
  }
  return documents;
}

/** Document list as shown to the routing model. */
export function describeDocuments(documents: DocumentSet): string {
  if (documents.size === 0) {
    return 'No company documents are available.';
  }
  const lines = ['Available company documents:'];
  for (const doc of documents.values()) {
    lines.push(`- ${doc.filename}: ${doc.summary || doc.name}`);
  }
  return lines.join('\n');
}

import * as fs from 'node:fs/promises';
import { TurnAbortedError } from '../../core/errors.js';
import { ConversationContext } from '../../pipeline/conversation.js';
import type { AssistantPipeline } from '../../pipeline/pipeline.js';
import { logDebug } from '../../telemetry/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import { GENERATION_FAILED_MESSAGE, createError } from '../errors.js';
import { createProgressBar, formatDuration, printTable } from '../progress.js';

export interface BatchCommandOptions {
  pipeline: AssistantPipeline;
  file: string;
  agentType?: string;
  json: boolean;
  /** Progress bar on stderr (default: true) */
  progress?: boolean;
  signal?: AbortSignal;
}

export interface BatchItemResult {
  line: number;
  query: string;
  response: string;
  action: string | null;
  cached: boolean;
  ok: boolean;
  error?: string;
}

export interface BatchSummary {
  results: BatchItemResult[];
  answered: number;
  cached: number;
  failed: number;
  elapsedMs: number;
}

export interface BatchQuery {
  line: number;
  query: string;
}

/** One query per line; blank lines and `#` comments are skipped. */
export function parseBatchFile(content: string): BatchQuery[] {
  const queries: BatchQuery[] = [];
  content.split(/\r?\n/).forEach((raw, index) => {
    const query = raw.trim();
    if (!query || query.startsWith('#')) return;
    queries.push({ line: index + 1, query });
  });
  return queries;
}

async function readBatchFile(file: string): Promise<string> {
  try {
    return await fs.readFile(file, 'utf8');
  } catch (error) {
    throw createError('INPUT_UNREADABLE', `Cannot read ${file}: ${getErrorMessage(error)}`, { file });
  }
}

function truncate(text: string, max: number): string {
  const flat = text.replace(/\s+/g, ' ');
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
}

export async function batchCommand(options: BatchCommandOptions): Promise<BatchSummary> {
  const { pipeline, json } = options;
  const queries = parseBatchFile(await readBatchFile(options.file));
  if (queries.length === 0) {
    throw createError('INVALID_ARGUMENT', `No queries found in ${options.file}`);
  }

  const started = Date.now();
  const bar = options.progress === false ? undefined : createProgressBar({ total: queries.length });
  const results: BatchItemResult[] = [];

  try {
    for (const { line, query } of queries) {
      try {
        const result = await pipeline.handle(query, {
          agentType: options.agentType,
          context: new ConversationContext(),
          signal: options.signal,
        });
        results.push({ line, query, response: result.response, action: result.action, cached: result.cached, ok: true });
      } catch (error) {
        if (error instanceof TurnAbortedError) throw error;
        logDebug('[answer-router] batch query failed', { line, error: getErrorMessage(error) });
        results.push({
          line,
          query,
          response: GENERATION_FAILED_MESSAGE,
          action: null,
          cached: false,
          ok: false,
          error: getErrorMessage(error),
        });
      }
      bar?.increment(1, { task: `line ${line}` });
    }
  } finally {
    bar?.stop();
  }

  const summary: BatchSummary = {
    results,
    answered: results.filter((result) => result.ok).length,
    cached: results.filter((result) => result.cached).length,
    failed: results.filter((result) => !result.ok).length,
    elapsedMs: Date.now() - started,
  };

  if (json) {
    console.log(JSON.stringify(summary, null, 2));
    return summary;
  }

  printTable(
    ['line', 'action', 'cached', 'response'],
    results.map((result) => [
      String(result.line),
      result.action ?? 'failed',
      result.cached ? 'yes' : 'no',
      truncate(result.response, 60),
    ])
  );
  console.log('');
  console.log(
    `${summary.answered} answered (${summary.cached} from cache), ${summary.failed} failed in ${formatDuration(summary.elapsedMs)}`
  );
  return summary;
}

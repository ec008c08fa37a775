import type { AssistantPipeline, TurnResult } from '../../pipeline/pipeline.js';
import { isDebugLogging, logDebug, logInfo } from '../../telemetry/logger.js';
import { formatUsageSummary, type UsageSummary } from '../../telemetry/usage_tracker.js';
import { createError } from '../errors.js';
import { formatDuration } from '../progress.js';

export interface AskCommandOptions {
  pipeline: AssistantPipeline;
  query: string;
  agentType?: string;
  json: boolean;
  signal?: AbortSignal;
}

export interface AskOutput {
  response: string;
  action: string | null;
  source: string | null;
  cached: boolean;
  stored: boolean;
  agentType: string;
  hashKey: string;
  elapsedMs: number;
  usage: UsageSummary | null;
}

export function toAskOutput(result: TurnResult, elapsedMs: number, usage: UsageSummary | undefined): AskOutput {
  return {
    response: result.response,
    action: result.action,
    source: result.decision?.source ?? null,
    cached: result.cached,
    stored: result.stored,
    agentType: result.agentType,
    hashKey: result.hashKey,
    elapsedMs,
    usage: usage ?? null,
  };
}

export async function askCommand(options: AskCommandOptions): Promise<TurnResult> {
  const { pipeline, json } = options;
  const query = options.query.trim();
  if (!query) {
    throw createError('INVALID_ARGUMENT', 'Query is required. Usage: answer-router ask "<query>"');
  }

  const started = Date.now();
  const result = await pipeline.handle(query, { agentType: options.agentType, signal: options.signal });
  const elapsedMs = Date.now() - started;
  const usage = pipeline.usage?.summary();

  if (json) {
    console.log(JSON.stringify(toAskOutput(result, elapsedMs, usage), null, 2));
    return result;
  }

  console.log(result.response);
  logDebug('[answer-router] answered', {
    action: result.action,
    cached: result.cached,
    elapsed: formatDuration(elapsedMs),
  });
  if (usage && isDebugLogging()) {
    logInfo(`[answer-router] usage\n${formatUsageSummary(usage)}`);
  }
  return result;
}

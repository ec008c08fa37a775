/**
 * @fileoverview Argument parsing and command dispatch
 *
 * `runCli` never throws: every failure is printed to stderr and turned into
 * an exit code, so the bin only has to set `process.exitCode`.
 */

import { parseArgs } from 'node:util';
import { ALL_AGENT_TYPES, loadConfig, type AssistantConfig } from '../config/index.js';
import { createAssistantPipeline, openConfiguredCache } from '../pipeline/factory.js';
import type { AssistantPipeline } from '../pipeline/pipeline.js';
import type { QueryCacheStore } from '../storage/query_cache.js';
import { setDebugLogging } from '../telemetry/logger.js';
import { askCommand } from './commands/ask.js';
import { batchCommand } from './commands/batch.js';
import { cacheCommand, type CacheAction } from './commands/cache.js';
import { migrateCommand } from './commands/migrate.js';
import { createError, formatError, formatErrorJson, getExitCode } from './errors.js';
import { showHelp } from './help.js';

export type ParsedCommand =
  | { command: 'help'; topic?: string }
  | { command: 'version' }
  | { command: 'ask'; query: string; agentType?: string }
  | { command: 'batch'; file: string; agentType?: string }
  | { command: 'cache'; action: CacheAction; agentType?: string; all: boolean }
  | { command: 'migrate' };

export type ParsedCli = ParsedCommand & { json: boolean; debug: boolean };

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  createPipeline?: (config: AssistantConfig) => Promise<AssistantPipeline>;
  openCache?: (config: AssistantConfig) => Promise<QueryCacheStore | undefined>;
}

const CACHE_ACTIONS: readonly CacheAction[] = ['stats', 'clear', 'sweep'];

function isCacheAction(value: string | undefined): value is CacheAction {
  return CACHE_ACTIONS.some((action) => action === value);
}

function parseOptions(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        help: { type: 'boolean', short: 'h', default: false },
        version: { type: 'boolean', short: 'v', default: false },
        json: { type: 'boolean', default: false },
        debug: { type: 'boolean', default: false },
        'agent-type': { type: 'string' },
        all: { type: 'boolean', default: false },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    // parseArgs reports unknown options and missing values as TypeError
    if (error instanceof TypeError) {
      throw createError('INVALID_ARGUMENT', error.message);
    }
    throw error;
  }
}

/**
 * @throws CliError (INVALID_ARGUMENT) for unknown options, missing operands
 * or flags that do not apply to the command
 */
export function parseCliArgs(argv: string[]): ParsedCli {
  const { values, positionals } = parseOptions(argv);
  const json = values.json === true;
  const debug = values.debug === true;
  const all = values.all === true;
  const agentType = values['agent-type']?.trim() || undefined;
  const [command, ...rest] = positionals;

  if (values.version) return { command: 'version', json, debug };
  if (values.help || command === undefined) return { command: 'help', topic: command, json, debug };
  if (command === 'help') return { command: 'help', topic: rest[0], json, debug };

  if (agentType === ALL_AGENT_TYPES) {
    throw createError('INVALID_ARGUMENT', `"${ALL_AGENT_TYPES}" is reserved; use \`cache clear --all\` instead`);
  }
  if (all && !(command === 'cache' && rest[0] === 'clear')) {
    throw createError('INVALID_ARGUMENT', '--all is only valid with `cache clear`');
  }

  switch (command) {
    case 'ask': {
      const query = rest.join(' ').trim();
      if (!query) {
        throw createError('INVALID_ARGUMENT', 'Query is required. Usage: answer-router ask "<query>"');
      }
      return { command: 'ask', query, agentType, json, debug };
    }
    case 'batch': {
      if (rest.length !== 1) {
        throw createError('INVALID_ARGUMENT', 'Exactly one file is required. Usage: answer-router batch <file>');
      }
      return { command: 'batch', file: rest[0], agentType, json, debug };
    }
    case 'cache': {
      const action = rest[0];
      if (!isCacheAction(action)) {
        throw createError('INVALID_ARGUMENT', `Unknown cache subcommand: ${action ?? '(none)'}. Use stats, clear or sweep`);
      }
      if (all && agentType) {
        throw createError('INVALID_ARGUMENT', '--all and --agent-type cannot be combined');
      }
      return { command: 'cache', action, agentType, all, json, debug };
    }
    case 'migrate':
      return { command: 'migrate', json, debug };
    default:
      throw createError('INVALID_ARGUMENT', `Unknown command: ${command}`);
  }
}

async function dispatch(parsed: ParsedCli, deps: CliDeps): Promise<number> {
  if (parsed.command === 'help') {
    showHelp(parsed.topic);
    return 0;
  }
  if (parsed.command === 'version') {
    const { VERSION } = await import('../index.js');
    console.log(`answer-router ${VERSION}`);
    return 0;
  }

  const config = loadConfig(deps.env ?? process.env);
  setDebugLogging(config.debug || parsed.debug);

  switch (parsed.command) {
    case 'migrate':
      await migrateCommand({ dbPath: config.cache.dbPath, json: parsed.json });
      return 0;
    case 'cache': {
      const cache = await (deps.openCache ?? openConfiguredCache)(config);
      if (!cache) {
        throw createError('CACHE_UNAVAILABLE', config.cache.enabled ? 'Cache could not be opened' : 'Cache is disabled');
      }
      try {
        await cacheCommand({
          cache,
          action: parsed.action,
          agentType: parsed.action === 'clear' && !parsed.all ? (parsed.agentType ?? config.agentType) : parsed.agentType,
          all: parsed.all,
          json: parsed.json,
        });
      } finally {
        cache.close();
      }
      return 0;
    }
    case 'ask':
    case 'batch': {
      const pipeline = await (deps.createPipeline ?? createAssistantPipeline)(config);
      try {
        if (parsed.command === 'ask') {
          await askCommand({ pipeline, query: parsed.query, agentType: parsed.agentType, json: parsed.json, signal: deps.signal });
          return 0;
        }
        const summary = await batchCommand({
          pipeline,
          file: parsed.file,
          agentType: parsed.agentType,
          json: parsed.json,
          signal: deps.signal,
        });
        return summary.failed > 0 ? 1 : 0;
      } finally {
        pipeline.close();
      }
    }
  }
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let json = argv.includes('--json');
  try {
    const parsed = parseCliArgs(argv);
    json = parsed.json;
    return await dispatch(parsed, deps);
  } catch (error) {
    console.error(json ? formatErrorJson(error) : formatError(error));
    return getExitCode(error);
  }
}

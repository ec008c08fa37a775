/**
 * @fileoverview Help text for answer-router CLI commands
 */

const HELP_TEXT = {
  main: `
answer-router - route questions to documents, web search or the model, with a shared answer cache

USAGE:
    answer-router <command> [options]

COMMANDS:
    ask "<query>"       Answer one query
    batch <file>        Answer every query in a file (one per line)
    cache stats         Show cache statistics
    cache clear         Delete cached answers
    cache sweep         Delete expired cached answers
    migrate             Create or upgrade the cache database
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    --json              Machine-readable output (errors included)
    --debug             Log prompts, decisions and usage to stderr

ENVIRONMENT (also read from .env):
    OPENROUTER_API_KEY        API key for the chat models (required by ask and batch)
    OPENROUTER_BASE_URL       OpenAI-compatible endpoint (default: https://openrouter.ai/api/v1)
    ORCHESTRATOR_MODEL_NAME   Routing and safety model
    GENERATOR_MODEL_NAME      Answer model
    SEARCH_MODEL_NAME         Search model for WEB_SEARCH_BACKEND=model
    WEB_SEARCH_BACKEND        model | serper
    SERPER_API_KEY            Required when WEB_SEARCH_BACKEND=serper
    KNOWLEDGE_BASE_DIR        Directory of markdown documents (default: knowledge_base)
    CACHE_ENABLED             true | false (default: true)
    CACHE_TTL_DAYS            Days before a cached answer expires; 0 never expires (default: 30)
    CACHE_DB_PATH             SQLite file (default: .answer-router/cache.db)
    CACHE_SKIP_ACTIONS        Comma-separated actions never cached, e.g. web_search
    AGENT_TYPE                Label cached answers are stored under (default: classic)
    SAFETY_MODE               rules | model | both (default: rules)
    ASSISTANT_DEBUG           Same as --debug
`,

  ask: `
answer-router ask - Answer one query

USAGE:
    answer-router ask "<query>" [--agent-type <label>] [--json]

OPTIONS:
    --agent-type <label>  Cache partition to read and write (default: AGENT_TYPE)
    --json                Print the answer, action, cache status and usage as JSON

A repeated query is answered from the cache without calling any model.
Press Ctrl+C to cancel; a cancelled query is not cached.

EXAMPLES:
    answer-router ask "What is our vacation policy?"
    answer-router ask "What changed in the latest Node.js release?" --json
`,

  batch: `
answer-router batch - Answer every query in a file

USAGE:
    answer-router batch <file> [--agent-type <label>] [--json]

Reads one query per line; blank lines and lines starting with # are skipped.
Each query runs in a fresh conversation. A failed query is reported and the
batch continues. Progress is shown on stderr.

EXAMPLES:
    answer-router batch queries.txt
    answer-router batch queries.txt --json > results.json
`,

  cache: `
answer-router cache - Inspect and maintain the answer cache

USAGE:
    answer-router cache stats [--agent-type <label>] [--json]
    answer-router cache clear [--agent-type <label> | --all]
    answer-router cache sweep [--agent-type <label>]

SUBCOMMANDS:
    stats   Entry and hit counts, overall and per agent type
    clear   Delete entries for one agent type (default: AGENT_TYPE), or all with --all
    sweep   Delete entries older than CACHE_TTL_DAYS
`,

  migrate: `
answer-router migrate - Create or upgrade the cache database

USAGE:
    answer-router migrate [--json]

Applies pending schema migrations to CACHE_DB_PATH and lists the applied versions.
`,
};

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.hasOwn(HELP_TEXT, value);
}

export function getCommandHelp(command?: string): string {
  if (command && isHelpTopic(command)) {
    return HELP_TEXT[command];
  }
  return HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  if (command && !isHelpTopic(command)) {
    console.log(`Unknown command: ${command}`);
  }
  console.log(getCommandHelp(command));
}

type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

let debugEnabled = process.env.ASSISTANT_DEBUG === 'true';

/** Debug output carries prompts and model responses; it is off unless asked for. */
export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugLogging(): boolean {
  return debugEnabled;
}

const emit = (level: 'info' | 'warn' | 'error' | 'debug', message: string, context?: LogContext): void => {
  if (level === 'debug' && !debugEnabled) return;
  // stdout belongs to the CLI's answer / --json output; logs stay on stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);

/**
 * @fileoverview Terminal output helpers
 *
 * Progress bars render on stderr so stdout stays clean for answers and
 * `--json` output.
 */

import cliProgress from 'cli-progress';

export interface ProgressBarHandle {
  increment(delta?: number, payload?: Record<string, unknown>): void;
  stop(): void;
}

export interface ProgressBarOptions {
  total: number;
  format?: string;
  stream?: NodeJS.WritableStream;
}

export function createProgressBar(options: ProgressBarOptions): ProgressBarHandle {
  const format = options.format || '{bar} {percentage}% | {value}/{total} | {task}';

  const bar = new cliProgress.SingleBar(
    {
      format,
      stream: options.stream ?? process.stderr,
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true,
    },
    cliProgress.Presets.shades_classic
  );

  bar.start(options.total, 0, { task: 'starting' });

  return {
    increment(delta = 1, payload?: Record<string, unknown>): void {
      bar.increment(delta, payload);
    },

    stop(): void {
      bar.stop();
    },
  };
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

export function formatTimestamp(date: Date | null): string {
  if (!date) return 'Never';
  return date.toISOString();
}

export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((row) => (row[i] || '').length));
    return Math.max(header.length, maxRowWidth);
  });

  const lines = [headers.map((header, i) => header.padEnd(widths[i])).join(' | ').trimEnd()];
  lines.push(widths.map((width) => '-'.repeat(width)).join('-+-'));
  for (const row of rows) {
    lines.push(row.map((cell, i) => (cell || '').padEnd(widths[i])).join(' | ').trimEnd());
  }
  return lines;
}

export function printTable(headers: string[], rows: string[][]): void {
  for (const line of formatTable(headers, rows)) {
    console.log(line);
  }
}

export function printKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): void {
  const maxKeyLength = Math.max(...items.map((item) => item.key.length));

  for (const item of items) {
    const value = item.value === null ? 'N/A' : String(item.value);
    console.log(`  ${item.key.padEnd(maxKeyLength)}: ${value}`);
  }
}

/**
 * Output Formatter
 * JSON envelopes and tables for the CLI; failures set the exit code.
 */

import Table from 'cli-table3';
import type { Command } from 'commander';
import { errorCode, errorMessage, exitCodeFor } from './errors.js';
import { loggers } from './logger.js';

export type OutputFormat = 'json' | 'table';

export interface GlobalOptions {
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  const opts: Record<string, unknown> = cmd.optsWithGlobals();
  return {
    format: opts.format === 'table' ? 'table' : 'json',
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
  };
}

/**
 * Prints `{ success: true, ...data }` as JSON, or runs the table renderer
 */
export function printSuccess(
  format: OutputFormat,
  data: Record<string, unknown>,
  tableRenderer?: () => void
): void {
  if (format === 'table' && tableRenderer) {
    tableRenderer();
    return;
  }
  console.log(JSON.stringify({ success: true, ...data }, null, 2));
}

export function printError(format: OutputFormat, error: unknown): void {
  const code = errorCode(error);
  const message = errorMessage(error);
  loggers.cli.debug('Command failed', { code, message });

  if (format === 'json') {
    console.log(JSON.stringify({ success: false, error: { code, message } }, null, 2));
  } else {
    console.error(`Error: ${message}`);
  }
  process.exitCode = exitCodeFor(error);
}

/**
 * Runs a command body with the shared error handling
 */
export async function runCommand(cmd: Command, fn: (options: GlobalOptions) => Promise<void> | void): Promise<void> {
  const options = getGlobalOptions(cmd);
  try {
    await fn(options);
  } catch (error) {
    printError(options.format, error);
  }
}

/**
 * Key/value table
 */
export function printKeyValueTable(rows: Array<[string, string]>): void {
  const table = new Table({ style: { head: ['cyan'] } });
  for (const [key, value] of rows) {
    table.push({ [key]: value });
  }
  console.log(table.toString());
}

export function printTable(head: string[], rows: Array<Array<string | number>>): void {
  const table = new Table({ head, style: { head: ['cyan'] } });
  for (const row of rows) {
    table.push(row);
  }
  console.log(table.toString());
}

/**
 * Masks all but the last four characters
 */
export function maskSecret(value: string): string {
  if (value.length <= 4) {
    return '****';
  }
  return `${'*'.repeat(Math.min(value.length - 4, 12))}${value.slice(-4)}`;
}

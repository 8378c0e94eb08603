/**
 * @fileoverview Job table loader: crontab text in, frozen job definitions out.
 * @module core/scheduler/table
 */

import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

import { ConfigError, ParseError } from '../errors';

import { parseRecurrence } from './cron';

import type { JobDefinition, JobEnvironment, LoadResult } from './types';

export interface LoadOptions {
  /**
   * Environment every job starts from; table assignments override it.
   */
  readonly defaults?: JobEnvironment;
}

const ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;
const FIVE_FIELD_LINE = /^(\S+\s+\S+\s+\S+\s+\S+\s+\S+)\s+(\S+)\s+(.*)$/;
const MACRO_LINE = /^(@\S+)\s+(\S+)\s+(.*)$/;
const IDENTITY = /^[A-Za-z_][A-Za-z0-9_.-]*\$?$/;

function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    if ((first === '"' || first === "'") && trimmed.endsWith(first)) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
}

function jobIdFor(schedule: string, identity: string, command: string): string {
  return createHash('sha256')
    .update(`${schedule}\u0000${identity}\u0000${command}`)
    .digest('hex')
    .slice(0, 12);
}

/**
 * Parse one job line.
 *
 * @param text - Line content without the trailing newline
 * @param line - 1-based line number, kept on the job and on errors
 * @param environment - Environment in effect at this line
 * @throws {ParseError} On a bad schedule, identity or empty command
 */
export function parseJobLine(text: string, line: number, environment: JobEnvironment): JobDefinition {
  const trimmed = text.trim();
  const shape = trimmed.startsWith('@') ? MACRO_LINE.exec(trimmed) : FIVE_FIELD_LINE.exec(trimmed);
  if (!shape) {
    throw new ParseError('expected a schedule, an identity and a command', line, text);
  }

  const [, schedule = '', identity = '', rawCommand = ''] = shape;
  const recurrence = parseRecurrence(schedule);
  if (!recurrence.success) {
    throw new ParseError(recurrence.error, line, text);
  }

  if (!IDENTITY.test(identity)) {
    throw new ParseError(`identity '${identity}' is not a valid user name`, line, text);
  }

  const command = rawCommand.trim();
  if (command === '') {
    throw new ParseError('command is empty', line, text);
  }

  return Object.freeze({
    id: jobIdFor(schedule.replace(/\s+/g, ' '), identity, command),
    line,
    schedule,
    recurrence: recurrence.data,
    identity,
    command,
    environment: Object.freeze({ ...environment }),
  }) satisfies JobDefinition;
}

/**
 * Parse a whole job table.
 *
 * Comment and blank lines are ignored; `NAME=value` lines update the
 * environment of every job line after them. A line that fails to parse is
 * reported in `errors` and skipped.
 */
export function parseTable(source: string, options: LoadOptions = {}): LoadResult {
  const jobs: JobDefinition[] = [];
  const errors: ParseError[] = [];
  const seen = new Map<string, number>();
  let environment: Record<string, string> = { ...options.defaults };

  source.split(/\r?\n/).forEach((text, index) => {
    const line = index + 1;
    const trimmed = text.trim();

    if (trimmed === '' || trimmed.startsWith('#')) {
      return;
    }

    const assignment = ASSIGNMENT.exec(trimmed);
    if (assignment) {
      const [, name = '', value = ''] = assignment;
      environment = { ...environment, [name]: unquote(value) };
      return;
    }

    try {
      const job = parseJobLine(text, line, environment);
      const occurrences = (seen.get(job.id) ?? 0) + 1;
      seen.set(job.id, occurrences);
      jobs.push(occurrences === 1 ? job : Object.freeze({ ...job, id: `${job.id}-${occurrences}` }));
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      errors.push(error);
    }
  });

  return {
    jobs: Object.freeze(jobs),
    errors: Object.freeze(errors),
  };
}

/**
 * Read the table file.
 *
 * @throws {ConfigError} When the file cannot be read
 */
export async function readTableFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read job table '${path}': ${reason}`, { cause: error });
  }
}

/**
 * Read and parse the table file.
 *
 * @throws {ConfigError} When the file cannot be read
 */
export async function loadTableFile(path: string, options: LoadOptions = {}): Promise<LoadResult> {
  return parseTable(await readTableFile(path), options);
}

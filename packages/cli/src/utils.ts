// packages/cli/src/utils.ts

import {
  type LogLevel,
  MAX_TIMEOUT_SEC,
  type StateFieldConfig,
  type StateValue,
  ToolRegistry,
  coerceFieldValue,
  createLogger,
  openDatabase,
  parseFieldType,
  resolveLogLevel,
} from '@cogflow/core';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';

export function getDbPath(projectDir?: string): string {
  const base = projectDir ?? process.cwd();
  const dbDir = join(base, '.cogflow');
  mkdirSync(dbDir, { recursive: true });
  return join(dbDir, 'runs.db');
}

/** Open the run database, creating its directory when a file path is given. */
export function openRunDatabase(dbPath?: string): ReturnType<typeof openDatabase> {
  const path = dbPath ?? getDbPath();
  if (path !== ':memory:') mkdirSync(dirname(path), { recursive: true });
  return openDatabase(path);
}

/** Tools offered to workflows run from the command line; none are bundled. */
export function createToolRegistry(): ToolRegistry {
  return new ToolRegistry();
}

export function createCliLogger(verbose?: boolean): ReturnType<typeof createLogger> {
  const level: LogLevel = verbose ? 'debug' : resolveLogLevel();
  return createLogger(level, 'cogflow');
}

/** Commander accumulator for repeatable options. */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError('Must be a positive integer');
  const n = Number.parseInt(value, 10);
  if (n <= 0) throw new InvalidArgumentError('Must be a positive integer');
  return n;
}

export function parseTimeoutSeconds(value: string): number {
  const seconds = parsePositiveInt(value);
  if (seconds > MAX_TIMEOUT_SEC) {
    throw new InvalidArgumentError(`Must be at most ${MAX_TIMEOUT_SEC} seconds`);
  }
  return seconds;
}

/**
 * Turn `key=value` pairs into run inputs, typed by the declared state fields.
 * Repeating a list field appends; unknown keys pass through as text so the
 * engine reports them against the declared fields.
 */
export function parseInputs(
  fields: readonly StateFieldConfig[],
  pairs: readonly string[],
): Record<string, StateValue> {
  const inputs: Record<string, StateValue> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new InvalidArgumentError(`Invalid input "${pair}": expected key=value`);
    }
    const key = pair.slice(0, eq).trim();
    const text = pair.slice(eq + 1);
    const field = fields.find((f) => f.name === key);
    const type = field ? parseFieldType(field.type) : null;
    if (!type) {
      inputs[key] = text;
      continue;
    }

    const value = coerceFieldValue(type, text);
    const previous = inputs[key];
    inputs[key] =
      type.kind === 'list' && Array.isArray(previous) && Array.isArray(value)
        ? [...previous, ...value]
        : value;
  }
  return inputs;
}

export function printError(error: unknown): void {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
}

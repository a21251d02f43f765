/**
 * Shared CLI flag helpers.
 */

import * as fs from 'node:fs';
import { CLIError } from './index';

/** Flags that take a value; everything else starting with `--` is a switch. */
const VALUE_FLAGS: ReadonlySet<string> = new Set([
  '--db',
  '--format',
  '--actor',
  '--references',
  '--rules',
  '--claims',
  '--inventory',
  '--plan',
  '--reason',
  '--notes',
  '--status',
  '--phase',
  '--concurrency',
  '--preset',
  '--critical',
  '--high',
  '--medium',
  '--low',
]);

/**
 * Extract a named flag's value from an argument array.
 * Returns the string following `flag`, or undefined if not present.
 */
export function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && idx + 1 < args.length) {
    return args[idx + 1];
  }
  return undefined;
}

/**
 * Arguments that are neither flags nor flag values.
 */
export function getPositionals(args: string[]): string[] {
  const positionals: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (VALUE_FLAGS.has(arg)) {
      i++;
      continue;
    }
    if (arg.startsWith('--')) continue;
    positionals.push(arg);
  }
  return positionals;
}

/**
 * Split off the first positional argument as the command name. The remaining
 * arguments keep their flags, global ones included.
 */
export function splitCommand(args: string[]): { command: string | undefined; rest: string[] } {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (VALUE_FLAGS.has(arg)) {
      i++;
      continue;
    }
    if (arg.startsWith('--')) continue;
    return { command: arg, rest: [...args.slice(0, i), ...args.slice(i + 1)] };
  }
  return { command: undefined, rest: args };
}

/**
 * Read a file referenced by a flag value, throwing CLIError if missing.
 */
export function readFlagFile(filePath: string, flagName: string): string {
  if (!fs.existsSync(filePath)) {
    throw new CLIError(`File not found for ${flagName}: ${filePath}`);
  }
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Read and parse a JSON file referenced by a flag value.
 */
export function readFlagJson(filePath: string, flagName: string): unknown {
  const text = readFlagFile(filePath, flagName);
  try {
    return JSON.parse(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new CLIError(`${flagName} file ${filePath} is not valid JSON: ${msg}`);
  }
}

/**
 * Parse a positive integer flag or argument.
 */
export function parsePositiveInt(value: string, label: string): number {
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) < 1) {
    throw new CLIError(`${label} must be a positive integer, got: ${value}`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Typed access to commander option values.
 */

import type { Command } from 'commander';

export type OptionValues = Record<string, unknown>;

export function stringOption(opts: OptionValues, key: string): string | undefined {
  const value = opts[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function booleanOption(opts: OptionValues, key: string): boolean {
  return opts[key] === true;
}

/** Values of a repeatable option, in the order given. */
export function listOption(opts: OptionValues, key: string): string[] {
  const value = opts[key];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/** commander accumulator for repeatable options. */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/** Command and global options merged, the command's winning. */
export function commandOptions(cmd: Command): OptionValues {
  return cmd.optsWithGlobals();
}

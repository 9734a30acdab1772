/**
 * Line-oriented terminal output shared by the commands.
 */

import chalk from 'chalk';
import type { ReviewSaveResult } from 'triage-shared';

export function warn(message: string): void {
  process.stderr.write(chalk.yellow(`warning: ${message}\n`));
}

export function printError(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(chalk.red(`error: ${message}\n`));
}

export function formatSaveResult(result: ReviewSaveResult, destination: string): string[] {
  const lines: string[] = [];
  if (result.saved > 0) lines.push(chalk.green(`✓ Saved ${result.saved} review action(s) to ${destination}`));
  if (result.failed > 0) {
    lines.push(chalk.red(`✘ ${result.failed} action(s) failed to save:`));
    for (const err of result.errors) lines.push(chalk.red(`  ${err.message}`));
  }
  if (lines.length === 0) lines.push(chalk.dim('Nothing to save.'));
  return lines;
}

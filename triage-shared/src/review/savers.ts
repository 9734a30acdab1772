/**
 * Review persistence: one structured `bd comment` per action, or a JSON
 * log file. Neither retries; failures are reported in the result.
 *
 * @module review/savers
 */

import { execFile } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import type { ReviewAction, ReviewSaveResult, ReviewSaver } from '../types/review';
import { formatReviewComment } from './reviewComment';
import { isMissingFile } from '../readers/helpers';

/** Runs a command in `cwd` and resolves with its stdout. */
export type CommandRunner = (command: string, args: readonly string[], cwd: string) => Promise<string>;

export const runCommand: CommandRunner = (command, args, cwd) =>
  new Promise((resolve, reject) => {
    execFile(command, [...args], { cwd, encoding: 'utf-8', timeout: 15_000 }, (err, stdout, stderr) => {
      if (err) {
        const output = stderr.trim() || stdout.trim();
        reject(new Error(output ? `${command} failed: ${err.message}, output: ${output}` : `${command} failed: ${err.message}`));
        return;
      }
      resolve(stdout);
    });
  });

function describeError(issueId: string, err: unknown): Error {
  const message = err instanceof Error ? err.message : String(err);
  return new Error(`${issueId}: ${message}`);
}

export class CommentReviewSaver implements ReviewSaver {
  constructor(
    private readonly workspaceRoot: string,
    private readonly run: CommandRunner = runCommand,
  ) {}

  async save(actions: readonly ReviewAction[]): Promise<ReviewSaveResult> {
    const errors: Error[] = [];
    let saved = 0;

    for (const action of actions) {
      const args = ['comment', action.issueId, formatReviewComment(action)];
      if (action.reviewer) args.push('--author', action.reviewer);
      try {
        await this.run('bd', args, this.workspaceRoot);
        saved++;
      } catch (err) {
        errors.push(describeError(action.issueId, err));
      }
    }

    return { saved, failed: actions.length - saved, errors };
  }
}

/** Appends the session's actions to a JSON array on disk. */
export class JsonReviewSaver implements ReviewSaver {
  constructor(private readonly filePath: string) {}

  async save(actions: readonly ReviewAction[]): Promise<ReviewSaveResult> {
    if (actions.length === 0) return { saved: 0, failed: 0, errors: [] };

    try {
      const existing = await this.readExisting();
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(this.filePath, JSON.stringify([...existing, ...actions], null, 2) + '\n', 'utf-8');
      return { saved: actions.length, failed: 0, errors: [] };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { saved: 0, failed: actions.length, errors: [new Error(`${this.filePath}: ${message}`)] };
    }
  }

  private async readExisting(): Promise<unknown[]> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    const parsed: unknown = JSON.parse(content);
    if (!Array.isArray(parsed)) throw new Error('existing review log is not a JSON array');
    return parsed;
  }
}

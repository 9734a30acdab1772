/**
 * `triage review [rootId]` — Interactive review of an issue tree.
 * Uses Ink (React for the terminal) for rendering; decisions are saved
 * through the configured saver when the session ends.
 */

import React from 'react';
import * as path from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';
import type { Issue, ResolvedSaveTarget, ReviewSaver } from 'triage-shared';
import {
  CommentReviewSaver,
  FuseMatcher,
  JsonReviewSaver,
  ReviewSessionTracker,
  loadIssues,
  loadReviewConfig,
  loadReviewTree,
  resolveSaveTarget,
  seedReviewState,
} from 'triage-shared';
import type { FuzzyMatcher } from 'triage-shared';
import { ReviewDashboardState } from '../dashboard/ReviewDashboardState';
import { copyToClipboard } from '../dashboard/clipboard';
import { rootFromSelection } from '../dashboard/rootSelection';
import type { RootSelection } from '../dashboard/rootSelection';
import { ReviewDashboard } from '../dashboard/ink/ReviewDashboard';
import { showRootPicker } from '../dashboard/ink/RootPicker';
import { commandOptions, listOption, stringOption } from './options';
import { formatSaveResult, warn } from './output';

export function createSaver(target: ResolvedSaveTarget, workspace: string): ReviewSaver {
  switch (target.kind) {
    case 'comments':
      return new CommentReviewSaver(workspace);
    case 'json':
      return new JsonReviewSaver(target.filePath);
  }
}

export function describeTarget(target: ResolvedSaveTarget): string {
  return target.kind === 'comments' ? 'bd comments' : target.filePath;
}

/** Label filters from flags and from the picker, first spelling kept. */
export function mergeLabels(...lists: readonly string[][]): string[] {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const label of lists.flat()) {
    const key = label.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(label);
  }
  return merged;
}

async function pickRoot(issues: readonly Issue[], matcher: FuzzyMatcher): Promise<RootSelection | null> {
  const result = await showRootPicker(issues, matcher);
  if (result.kind === 'cancelled') return null;
  const selection = rootFromSelection(result, issues);
  if (!selection) throw new Error(`no open epic has all labels: ${result.scopedLabels.join(', ')}`);
  return selection;
}

/** Renders the dashboard and resolves with whether the user asked to save. */
async function runDashboard(state: ReviewDashboardState): Promise<boolean> {
  const { render } = await import('ink');
  let save = false;

  const instance = render(
    React.createElement(ReviewDashboard, {
      state,
      onQuit: (shouldSave: boolean) => {
        save = shouldSave;
        instance.unmount();
      },
    }),
    { exitOnCtrlC: false },
  );

  await instance.waitUntilExit();
  return save;
}

export async function reviewAction(rootArg: string | undefined, _opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts = commandOptions(cmd);
  const workspace = path.resolve(stringOption(opts, 'workspace') ?? process.cwd());

  const config = await loadReviewConfig(
    {
      reviewer: stringOption(opts, 'reviewer'),
      reviewType: stringOption(opts, 'reviewType'),
      saveTo: stringOption(opts, 'saveTo'),
    },
    process.env,
    warn,
  );

  const issues = await loadIssues(workspace, warn);
  seedReviewState(issues);
  const matcher = new FuseMatcher();

  let rootId = rootArg;
  let labels = listOption(opts, 'label');
  if (!rootId) {
    const selection = await pickRoot(issues, matcher);
    if (!selection) return;
    rootId = selection.rootId;
    labels = mergeLabels(labels, selection.labels);
  }

  const tree = loadReviewTree(rootId, issues);
  const tracker = new ReviewSessionTracker({
    reviewer: config.reviewer,
    reviewType: config.reviewType,
    lookup: id => tree.issueMap.get(id),
  });
  const state = new ReviewDashboardState({ tree, issues, tracker, matcher, clipboard: copyToClipboard, labels });

  const save = await runDashboard(state);
  if (tracker.pendingCount === 0) return;
  if (!save) {
    process.stdout.write(chalk.dim(`Discarded ${tracker.pendingCount} review action(s).\n`));
    return;
  }

  const target = resolveSaveTarget(config.saveTo, workspace);
  const result = await createSaver(target, workspace).save(tracker.actions);
  for (const line of formatSaveResult(result, describeTarget(target))) process.stdout.write(line + '\n');
  if (result.failed > 0) process.exitCode = 1;
}

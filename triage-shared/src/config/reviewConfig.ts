/**
 * Reviewer configuration. Precedence: CLI flag, then environment
 * (`TRIAGE_REVIEWER`, `TRIAGE_REVIEW_TYPE`, `TRIAGE_SAVE_TO`), then
 * `~/.config/triage/config.json`, then defaults.
 *
 * @module config/reviewConfig
 */

import * as os from 'os';
import * as path from 'path';
import type { ReviewType } from '../types/review';
import { REVIEW_TYPES, isReviewType } from '../types/review';
import { isRecord, readJsonFile } from '../readers/helpers';
import type { WarningHandler } from '../readers/issues';
import { getConfigPath, getProjectDataPath, getProjectSlug } from '../paths';

/** `comments` posts `bd comment`s; `json` writes the per-project log; anything else is a JSON file path. */
export type SaveTarget = string;

export interface ReviewConfig {
  reviewer: string;
  reviewType: ReviewType;
  saveTo: SaveTarget;
}

export type ReviewConfigInput = Partial<Record<keyof ReviewConfig, string>>;

export const DEFAULT_SAVE_TARGET = 'comments';

function pickString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/** Validates a decoded config file. Non-string values are dropped; unknown keys are reported. */
export function parseConfigFile(raw: unknown, onWarning?: WarningHandler): ReviewConfigInput {
  if (raw === null) return {};
  if (!isRecord(raw)) {
    onWarning?.('config file is not a JSON object; ignoring it');
    return {};
  }
  const result: ReviewConfigInput = {
    reviewer: pickString(raw, 'reviewer'),
    reviewType: pickString(raw, 'reviewType'),
    saveTo: pickString(raw, 'saveTo'),
  };
  for (const key of Object.keys(raw)) {
    if (!(key in result)) onWarning?.(`unknown config key: ${key}`);
  }
  return result;
}

export async function readConfigFile(filePath = getConfigPath(), onWarning?: WarningHandler): Promise<ReviewConfigInput> {
  try {
    return parseConfigFile(await readJsonFile(filePath), onWarning);
  } catch (err) {
    onWarning?.(`ignoring ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    return {};
  }
}

export function configFromEnv(env: NodeJS.ProcessEnv): ReviewConfigInput {
  return {
    reviewer: env.TRIAGE_REVIEWER || undefined,
    reviewType: env.TRIAGE_REVIEW_TYPE || undefined,
    saveTo: env.TRIAGE_SAVE_TO || undefined,
  };
}

function defaultReviewer(): string {
  try {
    return os.userInfo().username;
  } catch {
    return '';
  }
}

/**
 * Merges config layers, highest precedence first.
 *
 * @throws Error when the winning review type is not a known one.
 */
export function resolveReviewConfig(
  layers: readonly ReviewConfigInput[],
  fallbackReviewer: () => string = defaultReviewer,
): ReviewConfig {
  const first = (key: keyof ReviewConfig) => layers.map(l => l[key]).find(v => v !== undefined && v !== '');

  const reviewType = first('reviewType') ?? 'plan';
  if (!isReviewType(reviewType)) {
    throw new Error(`invalid review type: ${reviewType} (expected one of ${REVIEW_TYPES.join(', ')})`);
  }

  return {
    reviewer: first('reviewer') ?? fallbackReviewer(),
    reviewType,
    saveTo: first('saveTo') ?? DEFAULT_SAVE_TARGET,
  };
}

/** Loads the full configuration for a command invocation. */
export async function loadReviewConfig(
  flags: ReviewConfigInput,
  env: NodeJS.ProcessEnv = process.env,
  onWarning?: WarningHandler,
): Promise<ReviewConfig> {
  const file = await readConfigFile(getConfigPath(), onWarning);
  return resolveReviewConfig([flags, configFromEnv(env), file]);
}

export type ResolvedSaveTarget =
  | { kind: 'comments' }
  | { kind: 'json'; filePath: string };

/** Turns a save target into a concrete destination for `workspace`. */
export function resolveSaveTarget(saveTo: SaveTarget, workspace: string): ResolvedSaveTarget {
  if (saveTo === 'comments') return { kind: 'comments' };
  if (saveTo === 'json') return { kind: 'json', filePath: getProjectDataPath(getProjectSlug(workspace), 'reviews') };
  return { kind: 'json', filePath: path.resolve(workspace, saveTo) };
}

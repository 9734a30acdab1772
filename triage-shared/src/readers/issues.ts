/**
 * Reader for beads issue stores (`<workspace>/.beads/*.jsonl`).
 *
 * @module readers/issues
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Dependency, Issue, IssueComment } from '../types/issue';
import { isDependencyType, isIssueStatus, isIssueType } from '../types/issue';
import { IssueSourceError } from '../errors';
import { isRecord } from './helpers';

export type WarningHandler = (message: string) => void;

/** Preferred store names, most canonical first. */
export const PREFERRED_JSONL_NAMES = ['issues.jsonl', 'beads.jsonl', 'beads.base.jsonl'] as const;

export interface JsonlEntry {
  name: string;
  /** Size in bytes. */
  size: number;
}

function str(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function isBackupOrArtifact(name: string): boolean {
  return name.includes('.backup')
    || name.includes('.orig')
    || name.includes('.merge')
    || name === 'deletions.jsonl';
}

function isConflictSide(name: string): boolean {
  return name.startsWith('beads.left') || name.startsWith('beads.right');
}

/**
 * Picks the store among a directory's files: a non-empty preferred name,
 * else the first non-empty candidate, else the first candidate. Returns null
 * when nothing qualifies.
 */
export function pickJsonlFile(entries: readonly JsonlEntry[], onWarning?: WarningHandler): string | null {
  const candidates: JsonlEntry[] = [];
  const conflicts: string[] = [];

  for (const entry of entries) {
    if (!entry.name.endsWith('.jsonl') || isBackupOrArtifact(entry.name)) continue;
    if (isConflictSide(entry.name)) {
      conflicts.push(entry.name);
      continue;
    }
    candidates.push(entry);
  }

  if (conflicts.length > 0) {
    onWarning?.(`Merge artifact files detected: ${conflicts.join(', ')}. Consider running 'bd clean' to remove them.`);
  }
  if (candidates.length === 0) return null;

  for (const preferred of PREFERRED_JSONL_NAMES) {
    const hit = candidates.find(c => c.name === preferred && c.size > 0);
    if (hit) return hit.name;
  }
  return (candidates.find(c => c.size > 0) ?? candidates[0]).name;
}

/**
 * Locates the issue store in a `.beads` directory.
 *
 * @throws IssueSourceError when the directory is unreadable or holds no store.
 */
export async function findJsonlPath(beadsDir: string, onWarning?: WarningHandler): Promise<string> {
  let names: string[];
  try {
    names = await fs.promises.readdir(beadsDir);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new IssueSourceError(`failed to read beads directory: ${reason}`);
  }

  const entries: JsonlEntry[] = [];
  for (const name of names) {
    if (!name.endsWith('.jsonl')) continue;
    const stat = await fs.promises.stat(path.join(beadsDir, name)).catch(() => null);
    if (stat?.isFile()) entries.push({ name, size: stat.size });
  }

  const picked = pickJsonlFile(entries, onWarning);
  if (!picked) throw new IssueSourceError(`no beads JSONL file found in ${beadsDir}`);
  return path.join(beadsDir, picked);
}

function toDependency(raw: unknown, issueId: string): Dependency | null {
  if (!isRecord(raw)) return null;
  const dependsOnId = str(raw.depends_on_id);
  if (!dependsOnId || !isDependencyType(raw.type)) return null;
  return { issueId: str(raw.issue_id) || issueId, dependsOnId, type: raw.type };
}

function toComment(raw: unknown): IssueComment | null {
  if (!isRecord(raw) || typeof raw.text !== 'string') return null;
  return { author: str(raw.author), text: raw.text, createdAt: str(raw.created_at) };
}

/**
 * Converts one decoded JSONL record into an Issue.
 *
 * @throws Error naming the first invalid field.
 */
export function toIssue(raw: unknown): Issue {
  if (!isRecord(raw)) throw new Error('record is not an object');

  const id = str(raw.id);
  if (!id) throw new Error('issue ID cannot be empty');
  const title = str(raw.title);
  if (!title) throw new Error('issue title cannot be empty');
  if (!isIssueStatus(raw.status)) throw new Error(`invalid status: ${String(raw.status)}`);
  if (!isIssueType(raw.issue_type)) throw new Error(`invalid issue type: ${String(raw.issue_type)}`);

  const created = Date.parse(str(raw.created_at));
  const updated = Date.parse(str(raw.updated_at));
  if (!Number.isNaN(created) && !Number.isNaN(updated) && updated < created) {
    throw new Error(`updated_at (${str(raw.updated_at)}) cannot be before created_at (${str(raw.created_at)})`);
  }

  const labels = Array.isArray(raw.labels) ? raw.labels.filter((l): l is string => typeof l === 'string') : [];
  const dependencies = Array.isArray(raw.dependencies)
    ? raw.dependencies.map(d => toDependency(d, id)).filter((d): d is Dependency => d !== null)
    : [];
  const comments = Array.isArray(raw.comments)
    ? raw.comments.map(toComment).filter((c): c is IssueComment => c !== null)
    : [];

  return {
    id,
    title,
    description: str(raw.description),
    design: str(raw.design),
    acceptanceCriteria: str(raw.acceptance_criteria),
    notes: str(raw.notes),
    status: raw.status,
    priority: typeof raw.priority === 'number' && Number.isInteger(raw.priority) ? raw.priority : 0,
    issueType: raw.issue_type,
    assignee: str(raw.assignee) || undefined,
    labels,
    dependencies,
    comments,
  };
}

/**
 * Parses JSONL text. Blank lines are skipped; malformed or invalid lines are
 * skipped and reported through `onWarning` with their 1-based line number.
 */
export function parseIssues(text: string, onWarning?: WarningHandler): Issue[] {
  const issues: Issue[] = [];
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);

  lines.forEach((line, i) => {
    const lineNum = i + 1;
    if (!line.trim()) return;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (err) {
      onWarning?.(`skipping malformed JSON on line ${lineNum}: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }

    try {
      issues.push(toIssue(raw));
    } catch (err) {
      onWarning?.(`skipping invalid issue on line ${lineNum}: ${err instanceof Error ? err.message : String(err)}`);
    }
  });

  return issues;
}

export async function loadIssuesFromFile(filePath: string, onWarning?: WarningHandler): Promise<Issue[]> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new IssueSourceError(`no beads issues found at ${filePath}: ${reason}`);
  }
  return parseIssues(content, onWarning);
}

/** Loads the issue store of `workspace` (the directory holding `.beads`). */
export async function loadIssues(workspace: string, onWarning?: WarningHandler): Promise<Issue[]> {
  const jsonlPath = await findJsonlPath(path.join(workspace, '.beads'), onWarning);
  return loadIssuesFromFile(jsonlPath, onWarning);
}

/**
 * Shared reader helpers.
 */

import * as fs from 'fs';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Reads and parses a JSON file. Returns null if the file is missing; other
 * read errors propagate.
 *
 * @throws SyntaxError when the contents are not JSON.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
  return JSON.parse(content);
}

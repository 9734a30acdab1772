/**
 * Config path resolution and workspace encoding.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

/**
 * Gets the triage config directory.
 * ~/.config/triage on Unix, %APPDATA%/triage on Windows.
 */
export function getConfigDir(): string {
  if (process.platform === 'win32') {
    return path.join(process.env.APPDATA || os.homedir(), 'triage');
  }
  return path.join(os.homedir(), '.config', 'triage');
}

/** ~/.config/triage/config.json */
export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

/**
 * Gets the path to a project-specific data file.
 * e.g., ~/.config/triage/reviews/-home-user-project.json
 */
export function getProjectDataPath(slug: string, subdomain: string): string {
  return path.join(getConfigDir(), subdomain, `${slug}.json`);
}

/**
 * Encodes a workspace path as a filename.
 * Replaces path separators, colons, and underscores with hyphens.
 */
export function encodeWorkspacePath(workspacePath: string): string {
  const normalized = workspacePath.replace(/\\/g, '/');
  return normalized.replace(/[:/_]/g, '-');
}

/**
 * Derives a project slug from a workspace path.
 * Resolves symlinks, then encodes for use as a filename.
 */
export function getProjectSlug(cwd?: string): string {
  const dir = cwd || process.cwd();
  let resolved: string;
  try {
    resolved = fs.realpathSync(dir);
  } catch {
    resolved = path.resolve(dir);
  }
  return encodeWorkspacePath(resolved);
}

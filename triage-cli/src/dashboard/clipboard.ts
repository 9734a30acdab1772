/**
 * Cross-platform clipboard copy.
 *
 * Handles macOS (pbcopy), Windows (clip), Wayland (wl-copy), and X11
 * (xclip, xsel). Returns a result object; nothing is thrown.
 */

import { execFileSync } from 'child_process';

export interface ClipboardResult {
  success: boolean;
  /** Human-readable message suitable for display in a toast. */
  message: string;
}

/** Clipboard collaborator handed to the dashboard. */
export type Clipboard = (text: string) => ClipboardResult;

type ClipboardCommand = readonly [string, readonly string[]];

/** Candidate commands for a platform, in order of preference. */
export function clipboardCommands(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): ClipboardCommand[] {
  if (platform === 'darwin') return [['pbcopy', []]];
  if (platform === 'win32') return [['clip', []]];

  const commands: ClipboardCommand[] = [];
  if (env.WAYLAND_DISPLAY) commands.push(['wl-copy', []]);
  commands.push(['xclip', ['-selection', 'clipboard']]);
  commands.push(['xsel', ['--clipboard', '--input']]);
  return commands;
}

export const copyToClipboard: Clipboard = (text) => {
  const commands = clipboardCommands();
  for (const [cmd, args] of commands) {
    try {
      execFileSync(cmd, [...args], { input: text, stdio: ['pipe', 'ignore', 'ignore'], timeout: 5_000 });
      return { success: true, message: 'Copied to clipboard' };
    } catch {
      continue;
    }
  }
  return {
    success: false,
    message: `Clipboard unavailable (tried ${commands.map(([cmd]) => cmd).join(', ')})`,
  };
};

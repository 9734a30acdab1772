import { describe, it, expect, vi, beforeEach } from 'vitest';
import { execFileSync } from 'child_process';
import { clipboardCommands, copyToClipboard } from './clipboard';

vi.mock('child_process', () => ({
  execFileSync: vi.fn(),
}));

beforeEach(() => {
  vi.mocked(execFileSync).mockReset();
});

describe('clipboardCommands', () => {
  it('uses pbcopy on macOS and clip on Windows', () => {
    expect(clipboardCommands('darwin', {})).toEqual([['pbcopy', []]]);
    expect(clipboardCommands('win32', {})).toEqual([['clip', []]]);
  });

  it('prefers wl-copy under Wayland', () => {
    expect(clipboardCommands('linux', { WAYLAND_DISPLAY: 'wayland-0' }).map(([cmd]) => cmd))
      .toEqual(['wl-copy', 'xclip', 'xsel']);
    expect(clipboardCommands('linux', {}).map(([cmd]) => cmd)).toEqual(['xclip', 'xsel']);
  });
});

describe('copyToClipboard', () => {
  it('reports success from the first working command', () => {
    const result = copyToClipboard('hello');
    expect(result).toEqual({ success: true, message: 'Copied to clipboard' });
    expect(execFileSync).toHaveBeenCalledTimes(1);
    expect(vi.mocked(execFileSync).mock.calls[0][2]).toMatchObject({ input: 'hello' });
  });

  it('reports failure when every command fails', () => {
    vi.mocked(execFileSync).mockImplementation(() => {
      throw new Error('not found');
    });
    const result = copyToClipboard('hello');
    expect(result.success).toBe(false);
    expect(result.message.startsWith('Clipboard unavailable (tried ')).toBe(true);
  });
});

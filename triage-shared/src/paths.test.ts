import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { encodeWorkspacePath, getConfigDir, getConfigPath, getProjectDataPath } from './paths';

describe('encodeWorkspacePath', () => {
  it('replaces forward slashes with hyphens', () => {
    expect(encodeWorkspacePath('/home/user/project')).toBe('-home-user-project');
  });

  it('replaces colons with hyphens', () => {
    expect(encodeWorkspacePath('C:/Users/project')).toBe('C--Users-project');
  });

  it('replaces underscores with hyphens', () => {
    expect(encodeWorkspacePath('/home/my_project')).toBe('-home-my-project');
  });

  it('normalizes backslashes to forward slashes first', () => {
    expect(encodeWorkspacePath('C:\\Users\\project')).toBe('C--Users-project');
  });
});

describe('config paths', () => {
  it('ends with triage', () => {
    expect(getConfigDir()).toMatch(/triage$/);
  });

  it('places config.json in the config dir', () => {
    expect(getConfigPath()).toBe(path.join(getConfigDir(), 'config.json'));
  });

  it('places project data under a subdomain', () => {
    expect(getProjectDataPath('-ws', 'reviews')).toBe(path.join(getConfigDir(), 'reviews', '-ws.json'));
  });
});

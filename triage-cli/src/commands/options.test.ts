import { describe, it, expect } from 'vitest';
import { Command } from 'commander';
import { booleanOption, collect, commandOptions, listOption, stringOption } from './options';

describe('option readers', () => {
  const opts = { workspace: '/tmp/ws', json: true, label: ['a', 3, 'b'], empty: '' };

  it('reads strings', () => {
    expect(stringOption(opts, 'workspace')).toBe('/tmp/ws');
    expect(stringOption(opts, 'empty')).toBeUndefined();
    expect(stringOption(opts, 'json')).toBeUndefined();
  });

  it('reads booleans', () => {
    expect(booleanOption(opts, 'json')).toBe(true);
    expect(booleanOption(opts, 'missing')).toBe(false);
  });

  it('keeps only string list entries', () => {
    expect(listOption(opts, 'label')).toEqual(['a', 'b']);
    expect(listOption(opts, 'missing')).toEqual([]);
  });

  it('collects repeated values', () => {
    expect(collect('b', collect('a'))).toEqual(['a', 'b']);
  });
});

describe('commandOptions', () => {
  it('merges global and command options', () => {
    let seen: Record<string, unknown> = {};
    const program = new Command().exitOverride().option('--json');
    program.addCommand(
      new Command('tree')
        .option('--label <name>', 'label', collect)
        .action((_opts: Record<string, unknown>, cmd: Command) => {
          seen = commandOptions(cmd);
        }),
    );
    program.parse(['--json', 'tree', '--label', 'ui', '--label', 'api'], { from: 'user' });
    expect(seen).toEqual({ json: true, label: ['ui', 'api'] });
  });
});

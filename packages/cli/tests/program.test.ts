import { describe, expect, it } from 'vitest';
import type { Command } from 'commander';
import { createProgram } from '../src/program.js';

function find(parent: Command, ...names: string[]): Command | undefined {
  let current: Command | undefined = parent;
  for (const name of names) {
    current = current?.commands.find((c) => c.name() === name);
  }
  return current;
}

describe('taskpilot program', () => {
  it('registers the top-level commands', () => {
    const names = createProgram().commands.map((c) => c.name());
    expect(names).toEqual(['init', 'doctor', 'run', 'sessions', 'rules']);
  });

  it('registers run with its options', () => {
    const run = find(createProgram(), 'run');
    expect(run?.options.map((o) => o.long)).toEqual(['--budget', '--browser', '--dry-run', '--preset', '--verbose']);
  });

  it('registers session and rule subcommands', () => {
    const program = createProgram();
    expect(find(program, 'sessions', 'list')).toBeDefined();
    expect(find(program, 'sessions', 'show')).toBeDefined();
    expect(find(program, 'rules', 'ingest')?.options.map((o) => o.long)).toEqual(['--write', '--output', '--verbose']);
    expect(find(program, 'rules', 'try')).toBeDefined();
  });

  it('rejects a non-numeric budget', () => {
    const program = createProgram();
    program.exitOverride();
    const run = find(program, 'run');
    run?.exitOverride();
    run?.configureOutput({ writeErr: () => {} });
    run?.action(() => {});
    expect(() => program.parse(['run', 'Open Calculator', '--budget', 'ten'], { from: 'user' })).toThrow(
      'Budget must be a positive integer',
    );
  });

  it('parses a valid budget', () => {
    const program = createProgram();
    const run = find(program, 'run');
    let budget: unknown;
    run?.action((_goal: string, options: { budget?: number }) => {
      budget = options.budget;
    });
    program.parse(['run', 'Open Calculator', '--budget', '5'], { from: 'user' });
    expect(budget).toBe(5);
  });
});

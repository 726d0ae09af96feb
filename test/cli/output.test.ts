import { describe, it, expect, beforeAll, afterEach, vi } from 'vitest';
import chalk from 'chalk';
import { createProgram } from '../../src/cli/program.js';
import { printError, printTable, setJsonOutput, usageBar } from '../../src/cli/output.js';

describe('cli output', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    setJsonOutput(false);
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('should draw a usage bar', () => {
    expect(usageBar(3, 10, 10)).toBe('███░░░░░░░ 3/10');
    expect(usageBar(12, 10, 4)).toBe('████ 12/10');
    expect(usageBar(5, 0)).toBe('5');
  });

  it('should print tables as JSON objects in JSON mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    setJsonOutput(true);

    printTable(['ID', 'Label'], [['c1', 'alpha']]);

    expect(log).toHaveBeenCalledWith(JSON.stringify([{ ID: 'c1', Label: 'alpha' }], null, 2));
  });

  it('should set a failing exit code on errors', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    printError('Credential c9 not found');

    expect(error).toHaveBeenCalledWith('✗ Credential c9 not found');
    expect(process.exitCode).toBe(1);
  });
});

describe('createProgram', () => {
  it('should register every command', () => {
    const program = createProgram();
    expect(program.commands.map(c => c.name())).toEqual(['serve', 'generate', 'credentials', 'pool', 'logs']);
  });

  it('should register the credential subcommands', () => {
    const credentials = createProgram().commands.find(c => c.name() === 'credentials');
    expect(credentials?.commands.map(c => c.name())).toEqual(['list', 'add', 'update', 'remove', 'enable', 'disable']);
  });
});

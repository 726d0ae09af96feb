import { describe, it, expect, afterEach } from 'vitest';
import { applyCliSettings, resetCliOverrides, setCliOverrides } from '../../src/cli/context.js';
import { createProgram } from '../../src/cli/program.js';
import { isJsonOutput, setJsonOutput } from '../../src/cli/output.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import { getLogLevel, setLogLevel } from '../../src/utils/logger.js';

describe('applyCliSettings', () => {
  afterEach(() => {
    resetCliOverrides();
    setJsonOutput(false);
    setLogLevel('info');
  });

  it('should take JSON output and log level from config', () => {
    applyCliSettings({ ...DEFAULT_CONFIG, jsonOutput: true, logLevel: 'warn' });

    expect(isJsonOutput()).toBe(true);
    expect(getLogLevel()).toBe('warn');
  });

  it('should let flags win over config', () => {
    setCliOverrides({ logLevel: 'debug', jsonOutput: true });

    applyCliSettings({ ...DEFAULT_CONFIG, jsonOutput: false, logLevel: 'error' });

    expect(isJsonOutput()).toBe(true);
    expect(getLogLevel()).toBe('debug');
  });

  it('should apply --verbose without touching the environment', async () => {
    const before = process.env.LOG_LEVEL;
    const program = createProgram();
    program.command('noop').action(() => {});

    await program.parseAsync(['node', 'imagerelay', '--verbose', 'noop']);
    applyCliSettings({ ...DEFAULT_CONFIG, logLevel: 'warn' });

    expect(getLogLevel()).toBe('debug');
    expect(process.env.LOG_LEVEL).toBe(before);
  });
});

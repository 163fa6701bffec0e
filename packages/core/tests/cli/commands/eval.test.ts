import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { evaluateCommand } from '../../../src/cli/commands/eval.js';

describe('CLI eval', () => {
  let testDir: string;
  let flagsPath: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'filter-dsl-eval-'));
    flagsPath = join(testDir, 'flags.yaml');
    writeFileSync(flagsPath, 'filters:\n  active: true\n  banned: false\n', 'utf-8');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should evaluate to true', async () => {
    const result = await evaluateCommand({ expression: 'active & !banned', bindings: flagsPath });
    expect(result).toEqual({ success: true, expression: 'active & !banned', value: true });
    expect(console.log).toHaveBeenCalledWith('true');
  });

  it('should evaluate to false', async () => {
    const result = await evaluateCommand({ expression: 'active & banned', bindings: flagsPath });
    expect(result.value).toBe(false);
    expect(console.log).toHaveBeenCalledWith('false');
  });

  it('should report unresolved filters', async () => {
    const result = await evaluateCommand({ expression: 'active | ghost', bindings: flagsPath });
    expect(result.success).toBe(false);
    expect(result.error).toEqual({
      code: 'UNRESOLVED_REFERENCE',
      message: "Referenced filter 'ghost' not found in context",
    });
    expect(console.error).toHaveBeenCalledWith(
      "ERROR UNRESOLVED_REFERENCE: Referenced filter 'ghost' not found in context",
    );
  });

  it('should report a missing bindings file', async () => {
    const missing = join(testDir, 'nope.yaml');
    const result = await evaluateCommand({ expression: 'active', bindings: missing });
    expect(result.error).toEqual({
      code: 'INVALID_BINDINGS',
      message: `Bindings file not found: ${missing}`,
    });
  });

  it('should report a bindings path that cannot be read', async () => {
    const result = await evaluateCommand({ expression: 'active', bindings: testDir });
    expect(result.success).toBe(false);
    expect(result.error).toEqual({
      code: 'INVALID_BINDINGS',
      message: `Cannot read bindings file: ${testDir}`,
    });
    expect(console.error).toHaveBeenCalledWith(
      `ERROR INVALID_BINDINGS: Cannot read bindings file: ${testDir}`,
    );
  });

  it('should report a syntax error before reading the bindings', async () => {
    const result = await evaluateCommand({
      expression: 'active &&',
      bindings: join(testDir, 'nope.yaml'),
    });
    expect(result.error?.code).toBe('INVALID_TRANSITION');
  });

  it('should report invalid binding names', async () => {
    writeFileSync(flagsPath, 'my-flag: true\n', 'utf-8');
    const result = await evaluateCommand({ expression: 'active', bindings: flagsPath });
    expect(result.error?.code).toBe('INVALID_IDENTIFIER');
  });

  it('should log loaded bindings at debug level', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    await evaluateCommand({ expression: 'active', bindings: flagsPath, logger });
    expect(logger.debug).toHaveBeenCalledWith('Loaded bindings', { path: flagsPath, count: 2 });
  });

  it('should print JSON when asked', async () => {
    await evaluateCommand({ expression: '!banned', bindings: flagsPath, json: true });
    const output: unknown = JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]));
    expect(output).toEqual({ success: true, expression: '!banned', value: true });
  });
});

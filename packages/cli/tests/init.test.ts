import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { runInit } from '../src/commands/init.ts';

describe('runInit', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'bin2const-init-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes a config with the requested tab size', () => {
    runInit({ project: dir, force: false, tabSize: 2 });
    expect(readFileSync(join(dir, 'bin2const.json'), 'utf-8')).toBe('{\n  "tabSize": 2\n}\n');
  });

  it('refuses to overwrite without --force', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    writeFileSync(join(dir, 'bin2const.json'), '{"tabSize": 8}\n');
    runInit({ project: dir, force: false });
    expect(error).toHaveBeenCalledWith('bin2const.json already exists. Use --force to overwrite.');
    expect(process.exitCode).toBe(1);
    expect(readFileSync(join(dir, 'bin2const.json'), 'utf-8')).toBe('{"tabSize": 8}\n');
  });

  it('overwrites with --force', () => {
    writeFileSync(join(dir, 'bin2const.json'), '{"tabSize": 8}\n');
    runInit({ project: dir, force: true });
    expect(readFileSync(join(dir, 'bin2const.json'), 'utf-8')).toBe('{}\n');
  });
});

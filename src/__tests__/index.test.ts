import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { main } from '../index.js';

describe('main', () => {
  let tmp: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    tmp = mkdtempSync(join(tmpdir(), 'docbin-cli-'));
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tmp, { recursive: true, force: true });
  });

  it('prints help and exits 0', async () => {
    expect(await main(['--help'])).toBe(0);
    expect(stdout.join('')).toContain('Usage:');
  });

  it('exits 2 on bad arguments', async () => {
    expect(await main(['--frobnicate'])).toBe(2);
    expect(stderr[0]).toBe('docbin: Unknown argument: --frobnicate\n');
  });

  it('compiles a docs directory and prints a summary', async () => {
    const docsDir = join(tmp, 'docs');
    mkdirSync(join(docsDir, 'time'), { recursive: true });
    writeFileSync(join(docsDir, 'time', 'metro.md'), 'title: metro\n');
    const binaryOut = join(tmp, 'docs.bin');

    const code = await main(['--docs', docsDir, '--out', binaryOut, '--no-xml']);

    expect(code).toBe(0);
    expect(existsSync(binaryOut)).toBe(true);
    expect(stdout.join('')).toMatch(/^docbin: 1 objects from 1 files \(0 skipped\) -> .*docs\.bin \(\d+ bytes\)\n$/);
  });

  it('exits 1 with the failing file and field', async () => {
    const docsDir = join(tmp, 'docs');
    mkdirSync(join(docsDir, 'math'), { recursive: true });
    writeFileSync(join(docsDir, 'math', 'bad.md'), 'title: bad\nflags:\n- description: nameless\n');

    const code = await main(['--docs', docsDir, '--out', join(tmp, 'docs.bin'), '--no-xml']);

    expect(code).toBe(1);
    expect(stderr.join('')).toBe('docbin: math/bad.md: flag is missing required field "name"\n');
  });
});

import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { countWords, formatCost, formatTokens } from '../../../src/utils/tokens.js';
import { hashBucket, sha256, shortHash } from '../../../src/utils/crypto.js';
import { appendLine, listFiles, readFileSafeAsync } from '../../../src/utils/fs.js';
import { retry, withTimeout } from '../../../src/utils/retry.js';

describe('token helpers', () => {
  it('countWords splits on whitespace', () => {
    expect(countWords('fix  the\nbug ')).toBe(3);
    expect(countWords('   ')).toBe(0);
  });

  it('formatTokens scales to K and M', () => {
    expect(formatTokens(950)).toBe('950');
    expect(formatTokens(1500)).toBe('1.5K');
    expect(formatTokens(2_500_000)).toBe('2.50M');
  });

  it('formatCost adds precision for small amounts', () => {
    expect(formatCost(0.00706)).toBe('$0.0071');
    expect(formatCost(0.05)).toBe('$0.050');
    expect(formatCost(5)).toBe('$5.00');
  });
});

describe('crypto helpers', () => {
  it('hashes deterministically', () => {
    expect(sha256('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    expect(shortHash('abc')).toBe('ba7816bf');
  });

  it('hashBucket maps text into [0, modulo)', () => {
    expect(hashBucket('abc')).toBe(parseInt('ba7816bf', 16) % 10000);
    expect(hashBucket('abc', 7)).toBe(parseInt('ba7816bf', 16) % 7);
  });
});

describe('fs helpers', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it('appendLine creates directories and terminates lines', async () => {
    dir = await mkdtemp(join(tmpdir(), 'lats-fs-'));
    const file = join(dir, 'a', 'b', 'log.jsonl');

    await appendLine(file, '{"n":1}');
    await appendLine(file, '{"n":2}\n');

    expect(await readFile(file, 'utf-8')).toBe('{"n":1}\n{"n":2}\n');
  });

  it('listFiles filters by extension and sorts', async () => {
    dir = await mkdtemp(join(tmpdir(), 'lats-fs-'));
    await writeFile(join(dir, 'b.jsonl'), '');
    await writeFile(join(dir, 'a.jsonl'), '');
    await writeFile(join(dir, 'notes.txt'), '');

    expect(await listFiles(dir, '.jsonl')).toEqual([join(dir, 'a.jsonl'), join(dir, 'b.jsonl')]);
  });

  it('readFileSafeAsync returns null for missing files', async () => {
    expect(await readFileSafeAsync(join(tmpdir(), 'lats-definitely-missing.txt'))).toBeNull();
  });
});

describe('retry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValue('ok');
    const onRetry = vi.fn();

    expect(await retry(fn, { maxRetries: 2, baseDelay: 0, maxDelay: 0, onRetry })).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error));
  });

  it('stops on non-retryable errors', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('invalid request'));

    await expect(retry(fn, { maxRetries: 3, baseDelay: 0, maxDelay: 0, retryableErrors: ['timeout'] })).rejects.toThrow(
      'invalid request',
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('withTimeout rejects slow promises', async () => {
    await expect(withTimeout(new Promise(() => undefined), 5, 'too slow')).rejects.toThrow('too slow');
    expect(await withTimeout(Promise.resolve(1), 50)).toBe(1);
  });
});

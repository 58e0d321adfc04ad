/**
 * Size Accumulator Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { humanize, totalBytes } from '../../../src/core/size-accumulator.js';
import { makeTempDir, removeDir, writeBytes } from '../../helpers/cache-fixture.js';

describe('totalBytes', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('size');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should return 0 for a missing directory', async () => {
    expect(await totalBytes(path.join(dir, 'missing'))).toBe(0);
  });

  it('should return 0 for an empty directory', async () => {
    expect(await totalBytes(dir)).toBe(0);
  });

  it('should sum files of 10, 20 and 30 bytes to 60', async () => {
    await writeBytes(path.join(dir, 'a'), 10);
    await writeBytes(path.join(dir, 'b'), 20);
    await writeBytes(path.join(dir, 'c'), 30);

    expect(await totalBytes(dir)).toBe(60);
  });

  it('should sum regular files recursively', async () => {
    await writeBytes(path.join(dir, 'a.bin'), 100);
    await writeBytes(path.join(dir, 'nested', 'b.bin'), 250);
    await writeBytes(path.join(dir, 'nested', 'deeper', 'c.bin'), 50);

    expect(await totalBytes(dir)).toBe(400);
  });

  it('should not count or follow symbolic links', async () => {
    await writeBytes(path.join(dir, 'blobs', 'blob'), 1000);
    await fs.mkdir(path.join(dir, 'snapshots'), { recursive: true });
    await fs.symlink(path.join(dir, 'blobs', 'blob'), path.join(dir, 'snapshots', 'model.safetensors'));
    await fs.symlink(path.join(dir, 'blobs'), path.join(dir, 'linked-dir'));

    expect(await totalBytes(dir)).toBe(1000);
  });
});

describe('humanize', () => {
  it('should format bytes below one kilobyte', () => {
    expect(humanize(0)).toBe('0.0 B');
    expect(humanize(1023)).toBe('1023.0 B');
  });

  it('should scale through 1024-based units', () => {
    expect(humanize(1024)).toBe('1.0 KB');
    expect(humanize(1536)).toBe('1.5 KB');
    expect(humanize(5 * 1024 * 1024)).toBe('5.0 MB');
    expect(humanize(3 * 1024 ** 3)).toBe('3.0 GB');
  });

  it('should round exact ties to the even digit', () => {
    expect(humanize(1280)).toBe('1.2 KB');
    expect(humanize(2304)).toBe('2.2 KB');
    expect(humanize(1792)).toBe('1.8 KB');
    expect(humanize(3840)).toBe('3.8 KB');
  });

  it('should stop at petabytes', () => {
    expect(humanize(2048 * 1024 ** 5)).toBe('2048.0 PB');
  });
});

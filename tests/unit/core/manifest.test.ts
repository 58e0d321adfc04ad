/**
 * Manifest Parser Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { parseManifest, parseManifestLine, readManifest } from '../../../src/core/manifest.js';
import { NotFoundError } from '../../../src/api/errors.js';
import { makeTempDir, removeDir } from '../../helpers/cache-fixture.js';

describe('parseManifestLine', () => {
  it('should skip blank and comment lines', () => {
    expect(parseManifestLine('', 1)).toBeNull();
    expect(parseManifestLine('   ', 2)).toBeNull();
    expect(parseManifestLine('# models', 3)).toBeNull();
    expect(parseManifestLine('   # indented comment', 4)).toBeNull();
  });

  it('should classify plain lines as models', () => {
    expect(parseManifestLine('  Qwen/Qwen2.5-0.5B-Instruct  ', 7)).toEqual({
      kind: 'model',
      name: 'Qwen/Qwen2.5-0.5B-Instruct',
      line: 7,
    });
  });

  it('should parse a dataset with name only', () => {
    expect(parseManifestLine('dataset:hellaswag', 1)).toEqual({
      kind: 'dataset',
      name: 'hellaswag',
      config: undefined,
      split: undefined,
      line: 1,
    });
  });

  it('should parse a dataset with a config', () => {
    expect(parseManifestLine('dataset:cais/mmlu,all', 2)).toEqual({
      kind: 'dataset',
      name: 'cais/mmlu',
      config: 'all',
      split: undefined,
      line: 2,
    });
  });

  it('should treat an empty config field as absent', () => {
    expect(parseManifestLine('dataset:trl-lib/Capybara,,train', 3)).toEqual({
      kind: 'dataset',
      name: 'trl-lib/Capybara',
      config: undefined,
      split: 'train',
      line: 3,
    });
  });

  it('should trim whitespace around dataset fields', () => {
    expect(parseManifestLine('dataset: org/ds , cfg , test ', 4)).toEqual({
      kind: 'dataset',
      name: 'org/ds',
      config: 'cfg',
      split: 'test',
      line: 4,
    });
  });
});

describe('parseManifest', () => {
  it('should number entries by their source line', () => {
    const content = ['# header', 'org/model-a', '', 'dataset:org/ds,,train', '# trailing'].join('\r\n');

    expect(parseManifest(content).map((entry) => [entry.kind, entry.name, entry.line])).toEqual([
      ['model', 'org/model-a', 2],
      ['dataset', 'org/ds', 4],
    ]);
  });

  it('should return nothing for a comment-only manifest', () => {
    expect(parseManifest('# nothing here\n\n')).toEqual([]);
  });
});

describe('readManifest', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) {
      await removeDir(dir);
      dir = undefined;
    }
  });

  it('should read entries from disk', async () => {
    dir = await makeTempDir('manifest');
    const file = path.join(dir, 'models.txt');
    await fs.writeFile(file, 'org/a\ndataset:org/b\n');

    const entries = await readManifest(file);
    expect(entries.map((entry) => entry.name)).toEqual(['org/a', 'org/b']);
  });

  it('should throw NotFoundError for a missing file', async () => {
    const missing = '/nonexistent/hubcache/manifest.txt';
    await expect(readManifest(missing)).rejects.toThrow(NotFoundError);
    await expect(readManifest(missing)).rejects.toThrow(`File not found: ${missing}`);
  });
});

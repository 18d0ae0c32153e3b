/**
 * Tests for the URL file extractor, run against real temporary folders
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { execFileSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import type { PathLike } from 'node:fs';
import { mkdir, mkdtemp, readdir, rm, symlink, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { UrlFileExtractor } from '../url-file-extractor';

// Deleting any file named locked.url fails; everything else is the real module
vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    unlink: async (target: PathLike) => {
      if (String(target).endsWith('locked.url')) {
        throw new Error('EPERM: operation not permitted, unlink');
      }
      return actual.unlink(target);
    },
  };
});

describe('UrlFileExtractor', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'ficdrop-extract-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('creates the folder and its parents on construction', () => {
    const folder = path.join(root, 'nested', 'drop');

    new UrlFileExtractor(folder);
    new UrlFileExtractor(folder);

    expect(existsSync(folder)).toBe(true);
  });

  it('extracts every URL file once and deletes it', async () => {
    const urls = [
      'https://archiveofourown.org/works/1',
      'https://archiveofourown.org/works/2',
      'https://fanfiction.net/s/3',
    ];
    await Promise.all(urls.map((url, i) => writeFile(path.join(root, `test${i}.url`), url)));
    const extractor = new UrlFileExtractor(root);

    const items = await extractor.extract();

    expect(items.map((i) => i.rawUrl).sort()).toEqual(urls);
    expect(await readdir(root)).toEqual([]);
    await expect(extractor.extract()).resolves.toEqual([]);
  });

  it('trims content and records the source file', async () => {
    await writeFile(path.join(root, 'a.url'), '\n  https://example.com/story/789  \n');

    const items = await new UrlFileExtractor(root).extract();

    expect(items).toEqual([{ rawUrl: 'https://example.com/story/789', sourceFile: 'a.url' }]);
  });

  it('leaves whitespace-only files in place', async () => {
    await writeFile(path.join(root, 'blank.url'), '  \n\t ');

    const items = await new UrlFileExtractor(root).extract();

    expect(items).toEqual([]);
    expect(await readdir(root)).toEqual(['blank.url']);
  });

  it('ignores other extensions and directories', async () => {
    await writeFile(path.join(root, 'notes.txt'), 'https://example.com/a');
    await mkdir(path.join(root, 'folder.url'));

    const items = await new UrlFileExtractor(root).extract();

    expect(items).toEqual([]);
    expect((await readdir(root)).sort()).toEqual(['folder.url', 'notes.txt']);
  });

  it('keeps going past an unreadable file', async () => {
    for (let i = 0; i < 4; i++) {
      await writeFile(path.join(root, `ok${i}.url`), `https://archiveofourown.org/works/${i}`);
    }
    await symlink(path.join(root, 'missing-target'), path.join(root, 'broken.url'));

    const items = await new UrlFileExtractor(root).extract();

    expect(items).toHaveLength(4);
    expect(await readdir(root)).toEqual(['broken.url']);
  });

  it('keeps a file whose deletion fails and yields no item for it', async () => {
    await writeFile(path.join(root, 'locked.url'), 'https://archiveofourown.org/works/7');
    await writeFile(path.join(root, 'ok.url'), 'https://archiveofourown.org/works/8');

    const items = await new UrlFileExtractor(root).extract();

    expect(items).toEqual([{ rawUrl: 'https://archiveofourown.org/works/8', sourceFile: 'ok.url' }]);
    expect(await readdir(root)).toEqual(['locked.url']);
  });

  it('skips a FIFO without blocking the scan', async () => {
    execFileSync('mkfifo', [path.join(root, 'pipe.url')]);
    await writeFile(path.join(root, 'a.url'), 'https://archiveofourown.org/works/9');

    const items = await new UrlFileExtractor(root).extract();

    expect(items).toEqual([{ rawUrl: 'https://archiveofourown.org/works/9', sourceFile: 'a.url' }]);
    expect(await readdir(root)).toEqual(['pipe.url']);
  });

  it('skips a symlink that points at a FIFO', async () => {
    const fifo = path.join(root, 'pipe');
    execFileSync('mkfifo', [fifo]);
    await symlink(fifo, path.join(root, 'linked.url'));

    const items = await new UrlFileExtractor(root).extract();

    expect(items).toEqual([]);
    expect((await readdir(root)).sort()).toEqual(['linked.url', 'pipe']);
  });

  it('reads a symlink to a regular file', async () => {
    const target = path.join(root, 'target.txt');
    await writeFile(target, 'https://archiveofourown.org/works/10');
    await symlink(target, path.join(root, 'link.url'));

    const items = await new UrlFileExtractor(root).extract();

    expect(items).toEqual([
      { rawUrl: 'https://archiveofourown.org/works/10', sourceFile: 'link.url' },
    ]);
    expect(await readdir(root)).toEqual(['target.txt']);
  });

  it('throws when the folder cannot be listed', async () => {
    const folder = path.join(root, 'gone');
    const extractor = new UrlFileExtractor(folder);
    await rm(folder, { recursive: true });

    await expect(extractor.extract()).rejects.toThrow(/ENOENT/);
  });
});

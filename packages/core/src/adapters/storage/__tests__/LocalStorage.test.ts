import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { LocalStorage } from '../LocalStorage.js';
import { AlreadyExistsError, InvalidPathError, NotFoundError } from '../../../core/errors.js';
import { LocalPath } from '../../../core/types.js';
import { createTestLogger, TestLogger } from '../../../utils/logger.js';
import {
  BAR_TEXT,
  BUZZ_TEXT,
  makeTempDir,
  removeTempDir,
  writeSampleTree,
} from '../../../__tests__/fixtures/sampleTree.js';

const at = (path: string): LocalPath => ({ kind: 'local', path });

describe('LocalStorage', () => {
  let root: string;
  let foo: string;
  let logger: TestLogger;
  let storage: LocalStorage;

  beforeEach(async () => {
    root = await makeTempDir();
    foo = await writeSampleTree(root);
    logger = createTestLogger();
    storage = new LocalStorage(logger);
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe('exists / isDirectory', () => {
    it('detects files and directories', async () => {
      expect(await storage.exists(at(foo))).toBe(true);
      expect(await storage.exists(at(join(foo, 'bar.txt')))).toBe(true);
      expect(await storage.exists(at(join(foo, 'nope.txt')))).toBe(false);
      expect(await storage.isDirectory(at(foo))).toBe(true);
      expect(await storage.isDirectory(at(join(foo, 'bar.txt')))).toBe(false);
    });

    it('treats a path under a file as missing', async () => {
      expect(await storage.exists(at(join(foo, 'bar.txt', 'child')))).toBe(false);
    });

    it('isDirectory throws on a missing path', async () => {
      await expect(storage.isDirectory(at(join(root, 'missing')))).rejects.toThrow(NotFoundError);
    });
  });

  describe('list', () => {
    it('lists immediate children with directories marked', async () => {
      expect(await storage.list(at(foo))).toEqual(['bar.txt', 'fizz/']);
    });

    it('lists every file recursively', async () => {
      expect(await storage.list(at(foo), { recursive: true })).toEqual(['bar.txt', 'fizz/buzz.txt']);
    });

    it('prefixes full paths with the listed directory', async () => {
      expect(await storage.list(at(foo), { recursive: true, fullPath: true })).toEqual([
        join(foo, 'bar.txt'),
        join(foo, 'fizz', 'buzz.txt'),
      ]);
      expect(await storage.list(at(foo), { fullPath: true })).toEqual([join(foo, 'bar.txt'), `${join(foo, 'fizz')}/`]);
    });

    it('lists a file as itself', async () => {
      const bar = join(foo, 'bar.txt');
      expect(await storage.list(at(bar))).toEqual(['bar.txt']);
      expect(await storage.list(at(bar), { fullPath: true })).toEqual([bar]);
    });

    it('throws NotFoundError for a missing path', async () => {
      await expect(storage.list(at(join(root, 'missing')))).rejects.toThrow(NotFoundError);
    });
  });

  describe('copy', () => {
    it('copies a tree under its own name by default', async () => {
      const dest = join(root, 'dest');
      await storage.copy(at(foo), at(dest));

      expect(await readFile(join(dest, 'foo', 'bar.txt'), 'utf-8')).toBe(BAR_TEXT);
      expect(await readFile(join(dest, 'foo', 'fizz', 'buzz.txt'), 'utf-8')).toBe(BUZZ_TEXT);
    });

    it('copies only the contents when includeSourceDirName is false', async () => {
      const dest = join(root, 'dest');
      await storage.copy(at(foo), at(dest), { includeSourceDirName: false });

      expect((await readdir(dest)).sort()).toEqual(['bar.txt', 'fizz']);
      expect(await readFile(join(dest, 'fizz', 'buzz.txt'), 'utf-8')).toBe(BUZZ_TEXT);
    });

    it('replaces an existing destination tree', async () => {
      const dest = join(root, 'dest');
      await mkdir(dest, { recursive: true });
      await writeFile(join(dest, 'stale.txt'), 'old');

      await storage.copy(at(foo), at(dest), { includeSourceDirName: false });

      expect((await readdir(dest)).sort()).toEqual(['bar.txt', 'fizz']);
    });

    it('refuses to touch an existing destination without overwrite', async () => {
      const dest = join(root, 'dest');
      await mkdir(dest, { recursive: true });
      await writeFile(join(dest, 'stale.txt'), 'old');

      await expect(
        storage.copy(at(foo), at(dest), { includeSourceDirName: false, overwrite: false })
      ).rejects.toThrow(AlreadyExistsError);
      expect(await readdir(dest)).toEqual(['stale.txt']);
    });

    it('rejects a destination that overlaps the source, leaving the source intact', async () => {
      await expect(storage.copy(at(foo), at(root))).rejects.toThrow(
        `'${foo}' overlaps the source '${foo}'`
      );
      await expect(storage.copy(at(foo), at(foo), { includeSourceDirName: false })).rejects.toThrow(InvalidPathError);
      await expect(storage.copy(at(foo), at(join(foo, 'fizz')), { includeSourceDirName: false })).rejects.toThrow(
        InvalidPathError
      );

      expect(await storage.list(at(foo), { recursive: true })).toEqual(['bar.txt', 'fizz/buzz.txt']);
    });

    it('copies a file into an existing directory', async () => {
      const dest = join(root, 'dest');
      await mkdir(dest);
      await storage.copy(at(join(foo, 'bar.txt')), at(dest));

      expect(await readFile(join(dest, 'bar.txt'), 'utf-8')).toBe(BAR_TEXT);
    });

    it('copies a file to a new path, creating parents', async () => {
      const target = join(root, 'a', 'b', 'copy.txt');
      await storage.copy(at(join(foo, 'bar.txt')), at(target));

      expect(await readFile(target, 'utf-8')).toBe(BAR_TEXT);
    });

    it('refuses to overwrite a file without overwrite', async () => {
      const target = join(root, 'copy.txt');
      await writeFile(target, 'keep me');

      await expect(storage.copy(at(join(foo, 'bar.txt')), at(target), { overwrite: false })).rejects.toThrow(
        `Overwrite set to false and '${target}' already exists`
      );
      expect(await readFile(target, 'utf-8')).toBe('keep me');
    });

    it('fails for a missing source', async () => {
      await expect(storage.copy(at(join(root, 'missing')), at(join(root, 'x')))).rejects.toThrow(NotFoundError);
    });
  });

  describe('remove', () => {
    it('reports without deleting on a dry run, every time', async () => {
      expect(await storage.remove(at(foo), { dryRun: true })).toBe(2);
      expect(await storage.remove(at(foo), { dryRun: true })).toBe(2);

      expect(logger.messages('warn')).toEqual([
        `Deleting '${foo}' would remove 2 file(s)`,
        `Deleting '${foo}' would remove 2 file(s)`,
      ]);
      expect(await storage.list(at(foo), { recursive: true })).toEqual(['bar.txt', 'fizz/buzz.txt']);
    });

    it('deletes a directory tree', async () => {
      expect(await storage.remove(at(foo))).toBe(2);
      expect(await storage.exists(at(foo))).toBe(false);
      expect(logger.messages('info')).toEqual([`Removing 2 file(s) located in directory '${foo}'`]);
    });

    it('deletes a single file', async () => {
      const bar = join(foo, 'bar.txt');
      expect(await storage.remove(at(bar))).toBe(1);
      expect(await storage.exists(at(bar))).toBe(false);
    });

    it('throws for a missing path', async () => {
      await expect(storage.remove(at(join(root, 'missing')))).rejects.toThrow(NotFoundError);
    });
  });

  describe('size', () => {
    it('measures files and sums directories', async () => {
      expect(await storage.size(at(join(foo, 'bar.txt')))).toBe(21);
      expect(await storage.size(at(foo))).toBe(43);
    });
  });

  describe('read / write', () => {
    it('writes atomically, creating parent directories', async () => {
      const target = at(join(root, 'new', 'dir', 'file.bin'));
      await storage.write(target, new Uint8Array([1, 2, 3]));

      expect([...(await storage.read(target))]).toEqual([1, 2, 3]);
      expect(await readdir(join(root, 'new', 'dir'))).toEqual(['file.bin']);
    });

    it('maps a missing file to NotFoundError', async () => {
      await expect(storage.read(at(join(root, 'missing.txt')))).rejects.toThrow(NotFoundError);
    });
  });
});

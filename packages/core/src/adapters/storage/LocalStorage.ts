import { copyFile, cp, mkdir, readFile, readdir, rename, rm, stat, unlink, writeFile } from 'fs/promises';
import type { Stats } from 'fs';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'path';
import { IStorage } from './IStorage.js';
import { AlreadyExistsError, InvalidPathError, NotFoundError } from '../../core/errors.js';
import { formatEntry, ListOptions, LocalPath, RemoveOptions } from '../../core/types.js';
import { Logger, createNoopLogger } from '../../utils/logger.js';

export interface LocalCopyOptions {
  overwrite?: boolean;
  includeSourceDirName?: boolean;
}

function contains(outer: string, inner: string): boolean {
  const rel = relative(resolve(outer), resolve(inner));
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Local filesystem backend.
 * Paths arrive already normalized by the PathClassifier.
 */
export class LocalStorage implements IStorage<LocalPath> {
  private logger: Logger;

  constructor(logger: Logger = createNoopLogger()) {
    this.logger = logger;
  }

  async exists(target: LocalPath): Promise<boolean> {
    return (await this.statOrNull(target.path)) !== null;
  }

  async isDirectory(target: LocalPath): Promise<boolean> {
    return (await this.statOrThrow(target.path)).isDirectory();
  }

  /**
   * List a directory. Non-recursive listings return immediate children with
   * a trailing '/' on directories; recursive listings return every file.
   * Both are sorted. A file lists as itself.
   */
  async list(target: LocalPath, options: ListOptions = {}): Promise<string[]> {
    const root = target.path;
    const stats = await this.statOrThrow(root);

    if (!stats.isDirectory()) {
      return [options.fullPath ? root : basename(root)];
    }

    if (options.recursive) {
      const files = await this.walkFiles(root);
      return files.map((file) => (options.fullPath ? join(root, file) : file)).sort();
    }

    const entries = await readdir(root, { withFileTypes: true });
    return entries
      .map((entry) =>
        formatEntry({
          name: options.fullPath ? join(root, entry.name) : entry.name,
          isDirectory: entry.isDirectory(),
        })
      )
      .sort();
  }

  /**
   * Copy a file, or replace a destination tree with a copy of the source tree.
   * Directory copies never merge: an existing destination is deleted first.
   */
  async copy(from: LocalPath, to: LocalPath, options: LocalCopyOptions = {}): Promise<void> {
    const overwrite = options.overwrite ?? true;
    const includeSourceDirName = options.includeSourceDirName ?? true;
    const source = await this.statOrThrow(from.path);

    if (source.isDirectory()) {
      const destination = includeSourceDirName ? join(to.path, basename(from.path)) : to.path;
      this.logger.debug(`Copying directory '${from.path}' to '${destination}'`);

      if (contains(from.path, destination) || contains(destination, from.path)) {
        throw new InvalidPathError(destination, `overlaps the source '${from.path}'`);
      }

      if (await this.statOrNull(destination)) {
        if (!overwrite) {
          throw new AlreadyExistsError(destination);
        }
        await rm(destination, { recursive: true, force: true });
      }

      await mkdir(dirname(destination), { recursive: true });
      await cp(from.path, destination, { recursive: true });
      return;
    }

    const existing = await this.statOrNull(to.path);
    if (existing && !overwrite) {
      throw new AlreadyExistsError(to.path);
    }

    const destination = existing?.isDirectory() ? join(to.path, basename(from.path)) : to.path;
    this.logger.debug(`Copying file '${from.path}' to '${destination}'`);
    await mkdir(dirname(destination), { recursive: true });
    await copyFile(from.path, destination);
  }

  /**
   * Delete a file or directory tree.
   * Single-file failures are logged and swallowed; directory failures throw.
   */
  async remove(target: LocalPath, options: RemoveOptions = {}): Promise<number> {
    const path = target.path;
    const stats = await this.statOrThrow(path);
    const count = stats.isDirectory() ? (await this.walkFiles(path)).length : 1;

    if (options.dryRun) {
      this.logger.warn(`Deleting '${path}' would remove ${count} file(s)`);
      return count;
    }

    if (stats.isDirectory()) {
      this.logger.info(`Removing ${count} file(s) located in directory '${path}'`);
      await rm(path, { recursive: true });
      return count;
    }

    this.logger.info(`Removing 1 file located at '${path}'`);
    try {
      await unlink(path);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Failed to delete '${path}': ${reason}`);
    }
    return count;
  }

  async size(target: LocalPath): Promise<number> {
    const stats = await this.statOrThrow(target.path);
    if (!stats.isDirectory()) {
      return stats.size;
    }

    let total = 0;
    for (const file of await this.walkFiles(target.path)) {
      total += (await stat(join(target.path, file))).size;
    }
    return total;
  }

  async read(target: LocalPath): Promise<Buffer> {
    try {
      return await readFile(target.path);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError(target.path, { cause: error });
      }
      throw error;
    }
  }

  /**
   * Write a file ATOMICALLY
   * Writes to a temp file on the same volume, then renames over the target
   */
  async write(target: LocalPath, data: Uint8Array | string): Promise<void> {
    const tempPath = `${target.path}.tmp-${Date.now()}-${Math.random().toString(36).slice(2)}`;

    await mkdir(dirname(target.path), { recursive: true });
    try {
      await writeFile(tempPath, data);
      await rename(tempPath, target.path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  async makeDirectory(target: LocalPath): Promise<void> {
    await mkdir(target.path, { recursive: true });
  }

  /**
   * Every file under `root`, relative to it, '/'-separated
   */
  async walkFiles(root: string, prefix = ''): Promise<string[]> {
    const files: string[] = [];
    const entries = await readdir(join(root, prefix), { withFileTypes: true });

    for (const entry of entries) {
      const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        files.push(...(await this.walkFiles(root, relative)));
      } else {
        files.push(relative);
      }
    }
    return files;
  }

  private async statOrNull(path: string): Promise<Stats | null> {
    try {
      return await stat(path);
    } catch (error) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        return null;
      }
      throw error;
    }
  }

  private async statOrThrow(path: string): Promise<Stats> {
    const stats = await this.statOrNull(path);
    if (!stats) {
      throw new NotFoundError(path);
    }
    return stats;
  }
}

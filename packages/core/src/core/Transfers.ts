// src/core/Transfers.ts
//
// Cross-backend copies. Every transfer runs Planning -> OverwriteCheck ->
// Fanout -> Completed. There is no rollback: files that finished before a
// failure stay where they landed.

import { basename, join } from 'path';
import type { ObjectCannedACL } from '@aws-sdk/client-s3';
import { AlreadyExistsError, InvalidPathError, NotFoundError, TransferError, TransferFailure, toError } from './errors.js';
import { formatPath, formatRemote, joinRemote, remoteBasename } from './PathClassifier.js';
import { LocalPath, ParsedPath, RemotePath, TransferItem, TransferPlan } from './types.js';
import { LocalStorage } from '../adapters/storage/LocalStorage.js';
import { S3Storage } from '../adapters/storage/S3Storage.js';
import { Logger, withMinLevel } from '../utils/logger.js';
import { mapSettled } from '../utils/Semaphore.js';

export interface ResolvedCopyOptions {
  overwrite: boolean;
  includeSourceDirName: boolean;
  concurrency: number;
  acl: ObjectCannedACL;
}

function localPath(path: string): LocalPath {
  return { kind: 'local', path };
}

function overlaps(a: RemotePath, b: RemotePath): boolean {
  if (a.bucket !== b.bucket) return false;
  const within = (inner: string, outer: string) => !outer || inner === outer || inner.startsWith(`${outer}/`);
  return within(a.key, b.key) || within(b.key, a.key);
}

/**
 * Runs the three transfer directions that involve S3.
 * Local-to-local copies never reach this class.
 */
export class Transfers {
  private local: LocalStorage;
  private remote: S3Storage;
  private logger: Logger;

  constructor(local: LocalStorage, remote: S3Storage, logger: Logger) {
    this.local = local;
    this.remote = remote;
    this.logger = logger;
  }

  // ============ DIRECTIONS ============

  async remoteToRemote(from: RemotePath, to: RemotePath, options: ResolvedCopyOptions): Promise<void> {
    const directory = await this.inspectRemoteSource(from);
    const root = directory
      ? options.includeSourceDirName ? joinRemote(to, remoteBasename(from)) : to
      : await this.remoteFileDestination(to, remoteBasename(from));

    if (directory && overlaps(from, root)) {
      throw new InvalidPathError(formatRemote(root), `overlaps the source '${formatRemote(from)}'`);
    }

    this.logger.debug(`Copying s3 files: '${formatRemote(from)}' to s3 location: '${formatRemote(root)}'`);
    const plan = await this.planFromRemote(from, root, directory, (relative) => joinRemote(root, relative));

    await this.checkRemoteDestination(plan, options.overwrite);

    await this.fanOut(plan, options.concurrency, (item, storage) =>
      storage.copyObject(item.source, item.destination, { acl: options.acl })
    );
  }

  async remoteToLocal(from: RemotePath, to: LocalPath, options: ResolvedCopyOptions): Promise<void> {
    const directory = await this.inspectRemoteSource(from);
    let root = directory && options.includeSourceDirName ? localPath(join(to.path, remoteBasename(from))) : to;

    // A single object copied onto an existing directory lands inside it
    if (!directory && (await this.local.exists(to)) && (await this.local.isDirectory(to))) {
      root = localPath(join(to.path, remoteBasename(from)));
    }

    this.logger.debug(`Copying s3 files: '${formatRemote(from)}' to local location: '${root.path}'`);
    const plan = await this.planFromRemote(from, root, directory, (relative) => localPath(join(root.path, relative)));

    if (await this.local.exists(root)) {
      if (!options.overwrite) {
        throw new AlreadyExistsError(root.path);
      }
      if (directory) {
        await this.local.remove(root);
      }
    }

    if (directory) {
      await this.local.makeDirectory(root);
      for (const subdirectory of plan.directories) {
        this.logger.debug(`Creating local subfolder '${subdirectory.path}'`);
        await this.local.makeDirectory(subdirectory);
      }
    }

    await this.fanOut(plan, options.concurrency, (item, storage) =>
      storage.download(item.source, item.destination.path)
    );
  }

  async localToRemote(from: LocalPath, to: RemotePath, options: ResolvedCopyOptions): Promise<void> {
    if (!(await this.local.exists(from))) {
      throw new NotFoundError(from.path);
    }

    const directory = await this.local.isDirectory(from);
    const root = directory
      ? options.includeSourceDirName ? joinRemote(to, basename(from.path)) : to
      : await this.remoteFileDestination(to, basename(from.path));

    this.logger.debug(`Copying local files: '${from.path}' to s3 location: '${formatRemote(root)}'`);

    const plan: TransferPlan<LocalPath, RemotePath> = { root, directory, items: [], directories: [] };
    if (directory) {
      for (const relative of await this.local.walkFiles(from.path)) {
        plan.items.push({ source: localPath(join(from.path, relative)), destination: joinRemote(root, relative) });
      }
    } else {
      plan.items.push({ source: from, destination: root });
    }

    await this.checkRemoteDestination(plan, options.overwrite);

    await this.fanOut(plan, options.concurrency, (item, storage) =>
      storage.upload(item.source.path, item.destination, { acl: options.acl })
    );
  }

  // ============ PLANNING ============

  /**
   * Fails with NotFoundError when the source is missing; otherwise reports
   * whether it is a directory.
   */
  private async inspectRemoteSource(from: RemotePath): Promise<boolean> {
    if (!(await this.remote.exists(from))) {
      throw new NotFoundError(formatRemote(from));
    }
    return this.remote.isDirectory(from);
  }

  /**
   * A single file copied onto an existing prefix (or a bucket root) lands inside it
   */
  private async remoteFileDestination(to: RemotePath, name: string): Promise<RemotePath> {
    if ((await this.remote.exists(to)) && (await this.remote.isDirectory(to))) {
      return joinRemote(to, name);
    }
    return to;
  }

  private async planFromRemote<TDestination extends ParsedPath>(
    from: RemotePath,
    root: TDestination,
    directory: boolean,
    reroot: (relative: string) => TDestination
  ): Promise<TransferPlan<RemotePath, TDestination>> {
    if (!directory) {
      return { root, directory, items: [{ source: from, destination: root }], directories: [] };
    }

    const prefix = from.key ? `${from.key}/` : '';
    const walked = await this.remote.walk(from);

    return {
      root,
      directory,
      items: walked.files.map((object) => ({
        source: { ...from, key: object.key },
        destination: reroot(object.key.slice(prefix.length)),
      })),
      directories: walked.directories.map(reroot),
    };
  }

  /**
   * Every planned destination sits under the plan root, so a missing root
   * means no planned destination exists either.
   */
  private async checkRemoteDestination<TSource extends ParsedPath>(
    plan: TransferPlan<TSource, RemotePath>,
    overwrite: boolean
  ): Promise<void> {
    if (!(await this.remote.exists(plan.root))) {
      return;
    }
    if (!overwrite) {
      throw new AlreadyExistsError(formatRemote(plan.root));
    }
    if (plan.directory && plan.root.key && (await this.remote.isDirectory(plan.root))) {
      // Replace, never merge: clear the destination prefix before fan-out
      await this.remote.remove(plan.root);
    }
  }

  // ============ FAN-OUT ============

  /**
   * Run one task per file, at most `concurrency` at a time, and wait for all
   * of them. Per-file failures are collected into a single TransferError.
   * Tasks log through a storage handle scoped to this call with warnings
   * suppressed; the caller's logger is never reconfigured.
   */
  private async fanOut<TSource extends ParsedPath, TDestination extends ParsedPath>(
    plan: TransferPlan<TSource, TDestination>,
    concurrency: number,
    task: (item: TransferItem<TSource, TDestination>, storage: S3Storage) => Promise<void>
  ): Promise<void> {
    const scoped = new S3Storage({ client: this.remote.client, logger: withMinLevel(this.logger, 'error') });
    const results = await mapSettled(plan.items, concurrency, (item) => task(item, scoped));

    const failures: TransferFailure[] = [];
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const item = plan.items[index];
        failures.push({
          source: formatPath(item.source),
          destination: formatPath(item.destination),
          error: toError(result.reason),
        });
      }
    });

    const root = formatPath(plan.root);
    if (failures.length > 0) {
      this.logger.error(`${failures.length} of ${plan.items.length} file(s) failed to copy to '${root}'`);
      throw new TransferError(root, failures, plan.items.length - failures.length);
    }

    this.logger.info(`Copied ${plan.items.length} file(s) to '${root}'`);
  }
}

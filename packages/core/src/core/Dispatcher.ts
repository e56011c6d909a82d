// src/core/Dispatcher.ts
//
// The one entry point callers need. Each operation parses its path(s) once,
// then routes to the local or S3 backend.

import type { ObjectCannedACL, S3Client, S3ClientConfig } from '@aws-sdk/client-s3';
import { AlreadyExistsError } from './errors.js';
import { formatPath, parsePath } from './PathClassifier.js';
import { ResolvedCopyOptions, Transfers } from './Transfers.js';
import {
  CopyOptions,
  DEFAULT_ACL,
  DEFAULT_CONCURRENCY,
  ListOptions,
  LoadOptions,
  ParsedPath,
  PathInput,
  RemoteOptions,
  RemoveOptions,
  SaveOptions,
  WriteOptions,
} from './types.js';
import { CodecRegistry, createDefaultCodecs } from '../adapters/codecs/CodecRegistry.js';
import { CodecStore } from '../adapters/codecs/IObjectCodec.js';
import { IStorage } from '../adapters/storage/IStorage.js';
import { LocalStorage } from '../adapters/storage/LocalStorage.js';
import { S3Storage } from '../adapters/storage/S3Storage.js';
import { loadEnvConfig } from '../config/env.js';
import { Logger, createConsoleLogger, createNoopLogger } from '../utils/logger.js';

export interface DispatcherOptions {
  client?: S3Client;              // Shared S3 handle; built lazily from clientConfig otherwise
  clientConfig?: S3ClientConfig;
  logger?: Logger;
  concurrency?: number;           // Default fan-out width for copies
  acl?: ObjectCannedACL;          // Default canned ACL for S3 writes
  codecs?: CodecRegistry;
}

type StorageOperation<T> = <TPath extends ParsedPath>(storage: IStorage<TPath>, path: TPath) => Promise<T>;

function assertConcurrency(value: number): number {
  if (!Number.isFinite(value) || value < 1) {
    throw new RangeError(`concurrency must be at least 1, got ${value}`);
  }
  return Math.floor(value);
}

export class Dispatcher {
  readonly logger: Logger;
  readonly codecs: CodecRegistry;
  private local: LocalStorage;
  private s3: S3Storage | null = null;
  private options: DispatcherOptions;

  constructor(options: DispatcherOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? createNoopLogger();
    this.codecs = options.codecs ?? createDefaultCodecs();
    this.local = new LocalStorage(this.logger);
  }

  /**
   * Build a dispatcher from PATHBRIDGE_* and AWS_* environment variables,
   * logging to the console. Explicit options win over the environment.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env, overrides: DispatcherOptions = {}): Dispatcher {
    const config = loadEnvConfig(env);
    return new Dispatcher({
      clientConfig: config.clientConfig,
      concurrency: config.concurrency,
      acl: config.acl,
      logger: createConsoleLogger({ minLevel: config.logLevel }),
      ...overrides,
    });
  }

  // ============ FILE SYSTEM OPERATIONS ============

  async exists(path: PathInput, options: RemoteOptions = {}): Promise<boolean> {
    return this.route(parsePath(path), options, (storage, target) => storage.exists(target));
  }

  async isDirectory(path: PathInput, options: RemoteOptions = {}): Promise<boolean> {
    return this.route(parsePath(path), options, (storage, target) => storage.isDirectory(target));
  }

  /**
   * Sorted listing. Directories carry a trailing '/' unless recursive.
   */
  async list(path: PathInput, options: ListOptions & RemoteOptions = {}): Promise<string[]> {
    const listOptions: ListOptions = { fullPath: options.fullPath, recursive: options.recursive };
    return this.route(parsePath(path), options, (storage, target) => storage.list(target, listOptions));
  }

  /**
   * Delete a file or directory. Returns how many files were (or, on a dry
   * run, would be) removed.
   */
  async remove(path: PathInput, options: RemoveOptions & RemoteOptions = {}): Promise<number> {
    const removeOptions: RemoveOptions = { dryRun: options.dryRun };
    return this.route(parsePath(path), options, (storage, target) => storage.remove(target, removeOptions));
  }

  /**
   * Size in bytes; directories are summed over every file beneath them
   */
  async size(path: PathInput, options: RemoteOptions = {}): Promise<number> {
    return this.route(parsePath(path), options, (storage, target) => storage.size(target));
  }

  async readBytes(path: PathInput, options: RemoteOptions = {}): Promise<Buffer> {
    return this.route(parsePath(path), options, (storage, target) => storage.read(target));
  }

  async writeBytes(path: PathInput, data: Uint8Array | string, options: WriteOptions & RemoteOptions = {}): Promise<void> {
    const writeOptions: WriteOptions = { acl: this.aclFor(options) };
    await this.route(parsePath(path), options, (storage, target) => storage.write(target, data, writeOptions));
  }

  /**
   * Copy a file or directory tree between any two locations.
   *
   * Directory copies replace the destination rather than merging into it.
   * With `overwrite: false` an existing destination fails the call before
   * anything is written.
   */
  async copy(from: PathInput, to: PathInput, options: CopyOptions = {}): Promise<void> {
    const source = parsePath(from);
    const destination = parsePath(to);
    const resolved: ResolvedCopyOptions = {
      overwrite: options.overwrite ?? true,
      includeSourceDirName: options.includeSourceDirName ?? true,
      concurrency: assertConcurrency(options.concurrency ?? this.options.concurrency ?? DEFAULT_CONCURRENCY),
      acl: this.aclFor(options),
    };

    this.logger.info(`Copying '${formatPath(source)}' to '${formatPath(destination)}'`);

    if (source.kind === 'remote') {
      const transfers = new Transfers(this.local, this.remote(options), this.logger);
      if (destination.kind === 'remote') {
        await transfers.remoteToRemote(source, destination, resolved);
      } else {
        await transfers.remoteToLocal(source, destination, resolved);
      }
    } else if (destination.kind === 'remote') {
      const transfers = new Transfers(this.local, this.remote(options), this.logger);
      await transfers.localToRemote(source, destination, resolved);
    } else {
      await this.local.copy(source, destination, resolved);
    }
  }

  // ============ OBJECT LOAD / SAVE ============

  /**
   * Load a file into memory, decoding it with the codec for `format` (or
   * the one inferred from the extension). Other options go to the codec.
   */
  async load(path: PathInput, options: LoadOptions = {}): Promise<unknown> {
    const parsed = parsePath(path);
    const { format, client, ...codecOptions } = options;
    const codec = this.codecs.resolve(parsed, format);

    this.logger.info(`Loading '${formatPath(parsed)}' as ${codec.name}`);
    return codec.load({ path: parsed, store: this.store({ client }), options: codecOptions });
  }

  /**
   * Encode `value` and write it to `path`.
   * An existing target fails the call when `overwrite` is false.
   */
  async save(value: unknown, path: PathInput, options: SaveOptions = {}): Promise<void> {
    const parsed = parsePath(path);
    const { format, overwrite = true, client, acl, ...codecOptions } = options;
    const codec = this.codecs.resolve(parsed, format);
    const remoteOptions: RemoteOptions = { client };

    if (await this.route(parsed, remoteOptions, (storage, target) => storage.exists(target))) {
      if (!overwrite) {
        throw new AlreadyExistsError(formatPath(parsed));
      }
      if (codec.layout === 'directory') {
        await this.route(parsed, remoteOptions, (storage, target) => storage.remove(target));
      }
    }

    this.logger.info(`Saving '${formatPath(parsed)}' as ${codec.name}`);
    await codec.save(value, { path: parsed, store: this.store({ client, acl }), options: codecOptions });
  }

  // ============ INTERNALS ============

  private remote(options: RemoteOptions): S3Storage {
    if (options.client) {
      return new S3Storage({ client: options.client, logger: this.logger });
    }
    if (!this.s3) {
      this.s3 = new S3Storage({
        client: this.options.client,
        clientConfig: this.options.clientConfig,
        logger: this.logger,
      });
    }
    return this.s3;
  }

  private route<T>(parsed: ParsedPath, options: RemoteOptions, operation: StorageOperation<T>): Promise<T> {
    return parsed.kind === 'remote'
      ? operation(this.remote(options), parsed)
      : operation(this.local, parsed);
  }

  private aclFor(options: WriteOptions): ObjectCannedACL {
    return options.acl ?? this.options.acl ?? DEFAULT_ACL;
  }

  /**
   * Byte access for codecs, bound to one call's client and ACL
   */
  private store(options: WriteOptions & RemoteOptions): CodecStore {
    const writeOptions: WriteOptions = { acl: this.aclFor(options) };
    return {
      read: (path) => this.route(path, options, (storage, target) => storage.read(target)),
      write: (path, data) => this.route(path, options, (storage, target) => storage.write(target, data, writeOptions)),
      exists: (path) => this.route(path, options, (storage, target) => storage.exists(target)),
      isDirectory: (path) => this.route(path, options, (storage, target) => storage.isDirectory(target)),
      list: (path, listOptions) => this.route(path, options, (storage, target) => storage.list(target, listOptions)),
    };
  }
}

// src/index.ts

import { Dispatcher } from './core/Dispatcher.js';
import {
  CopyOptions,
  ListOptions,
  LoadOptions,
  PathInput,
  RemoteOptions,
  RemoveOptions,
  SaveOptions,
} from './core/types.js';

let defaultDispatcher: Dispatcher | null = null;

/**
 * The dispatcher behind the module-level functions, built from the
 * environment on first use.
 */
export function getDefaultDispatcher(): Dispatcher {
  if (!defaultDispatcher) {
    defaultDispatcher = Dispatcher.fromEnv();
  }
  return defaultDispatcher;
}

/**
 * Replace the default dispatcher (pass null to rebuild it lazily)
 */
export function setDefaultDispatcher(dispatcher: Dispatcher | null): void {
  defaultDispatcher = dispatcher;
}

export function exists(path: PathInput, options?: RemoteOptions): Promise<boolean> {
  return getDefaultDispatcher().exists(path, options);
}

export function isDirectory(path: PathInput, options?: RemoteOptions): Promise<boolean> {
  return getDefaultDispatcher().isDirectory(path, options);
}

export function list(path: PathInput, options?: ListOptions & RemoteOptions): Promise<string[]> {
  return getDefaultDispatcher().list(path, options);
}

export function copy(from: PathInput, to: PathInput, options?: CopyOptions): Promise<void> {
  return getDefaultDispatcher().copy(from, to, options);
}

export function remove(path: PathInput, options?: RemoveOptions & RemoteOptions): Promise<number> {
  return getDefaultDispatcher().remove(path, options);
}

export function size(path: PathInput, options?: RemoteOptions): Promise<number> {
  return getDefaultDispatcher().size(path, options);
}

export function load(path: PathInput, options?: LoadOptions): Promise<unknown> {
  return getDefaultDispatcher().load(path, options);
}

export function save(value: unknown, path: PathInput, options?: SaveOptions): Promise<void> {
  return getDefaultDispatcher().save(value, path, options);
}

export { Dispatcher, type DispatcherOptions } from './core/Dispatcher.js';
export { Transfers, type ResolvedCopyOptions } from './core/Transfers.js';
export * from './core/PathClassifier.js';
export * from './core/errors.js';
export * from './core/types.js';
export * from './adapters/storage/index.js';
export * from './adapters/codecs/index.js';
export { loadEnvConfig, DEFAULT_LOG_LEVEL, type EnvConfig } from './config/env.js';
export { parseConfig, DEFAULT_CONFIG_PATH, type ConfigValues } from './config/ConfigFile.js';
export * from './utils/logger.js';
export * from './utils/dates.js';
export { formatSize, generateToken } from './utils/format.js';
export { Semaphore, mapSettled } from './utils/Semaphore.js';

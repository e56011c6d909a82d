/**
 * Storage backends and the factory that picks one for a parsed path.
 */

import { LocalStorage } from './LocalStorage.js';
import { S3Storage, S3StorageConfig } from './S3Storage.js';
import { ParsedPath } from '../../core/types.js';

export { type IStorage } from './IStorage.js';
export { LocalStorage, type LocalCopyOptions } from './LocalStorage.js';
export { S3Storage, isNotFound, type S3StorageConfig, type ObjectSummary, type PrefixWalk } from './S3Storage.js';

export type StorageType = ParsedPath['kind'];

export interface StorageConfig extends S3StorageConfig {
    type: StorageType;
}

/**
 * Create the backend for one kind of path.
 * The S3 client is only built when an S3 backend is asked for.
 */
export function createStorage(config: StorageConfig & { type: 'local' }): LocalStorage;
export function createStorage(config: StorageConfig & { type: 'remote' }): S3Storage;
export function createStorage(config: StorageConfig): LocalStorage | S3Storage;
export function createStorage(config: StorageConfig): LocalStorage | S3Storage {
    if (config.type === 'remote') {
        return new S3Storage(config);
    }
    return new LocalStorage(config.logger);
}


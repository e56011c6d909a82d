/**
 * Storage abstraction shared by the local filesystem and S3 backends.
 * Each backend is typed on the path variant it owns, so the Dispatcher can
 * only hand it paths it understands.
 */

import { ListOptions, ParsedPath, RemoveOptions, WriteOptions } from '../../core/types.js';

export interface IStorage<TPath extends ParsedPath> {
    /**
     * Check if a file or directory exists
     */
    exists(path: TPath): Promise<boolean>;

    /**
     * Whether the path is a directory (a key prefix for S3).
     * Throws NotFoundError when nothing is there.
     */
    isDirectory(path: TPath): Promise<boolean>;

    /**
     * List a directory, or return a one-element list for a single file
     */
    list(path: TPath, options?: ListOptions): Promise<string[]>;

    /**
     * Delete a file or a whole directory. Returns the number of files counted.
     */
    remove(path: TPath, options?: RemoveOptions): Promise<number>;

    /**
     * Size in bytes; directories are summed recursively
     */
    size(path: TPath): Promise<number>;

    /**
     * Read a whole file
     */
    read(path: TPath): Promise<Buffer>;

    /**
     * Write a whole file, creating parents where the backend has them
     */
    write(path: TPath, data: Uint8Array | string, options?: WriteOptions): Promise<void>;
}

/**
 * S3 backend.
 * S3 has no directories: a "directory" is a key prefix with objects under
 * `key/`, or a zero-byte `key/` marker object.
 */

import {
    S3Client,
    S3ClientConfig,
    S3ServiceException,
    CopyObjectCommand,
    DeleteObjectCommand,
    DeleteObjectsCommand,
    GetObjectCommand,
    HeadBucketCommand,
    HeadObjectCommand,
    HeadObjectCommandOutput,
    ListObjectsV2Command,
    ListObjectsV2CommandOutput,
    NoSuchKey,
    NotFound,
    PutObjectCommand,
} from '@aws-sdk/client-s3';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { IStorage } from './IStorage.js';
import { InvalidPathError, NotFoundError, TransferError, TransferFailure } from '../../core/errors.js';
import { formatRemote, remoteBasename } from '../../core/PathClassifier.js';
import { DEFAULT_ACL, formatEntry, ListOptions, RemotePath, RemoveOptions, WriteOptions } from '../../core/types.js';
import { Logger, createNoopLogger } from '../../utils/logger.js';

export interface S3StorageConfig {
    client?: S3Client;              // Shared handle; takes precedence over clientConfig
    clientConfig?: S3ClientConfig;  // Region, endpoint, profile, credentials...
    logger?: Logger;
}

export interface ObjectSummary {
    key: string;
    size: number;
}

/**
 * Everything stored under a prefix. `directories` are relative paths of the
 * pseudo-directories implied by keys and marker objects.
 */
export interface PrefixWalk {
    files: ObjectSummary[];
    directories: string[];
    markers: string[];
}

const DELETE_BATCH_SIZE = 1000;

export function isNotFound(error: unknown): boolean {
    if (error instanceof NotFound || error instanceof NoSuchKey) {
        return true;
    }
    return error instanceof S3ServiceException && error.$metadata?.httpStatusCode === 404;
}

function directoryPrefix(remote: RemotePath): string {
    return remote.key ? `${remote.key}/` : '';
}

export class S3Storage implements IStorage<RemotePath> {
    readonly client: S3Client;
    private logger: Logger;

    constructor(config: S3StorageConfig = {}) {
        this.logger = config.logger ?? createNoopLogger();
        this.client = config.client ?? new S3Client({
            ...config.clientConfig,
            region: config.clientConfig?.region ?? process.env.AWS_REGION ?? 'us-east-1',
        });
    }

    /**
     * Check if an object, a prefix, or (for a bare bucket path) the bucket exists
     */
    async exists(remote: RemotePath): Promise<boolean> {
        if (!remote.key) {
            try {
                await this.client.send(new HeadBucketCommand({ Bucket: remote.bucket }));
                return true;
            } catch (error) {
                if (isNotFound(error)) return false;
                throw error;
            }
        }
        return (await this.head(remote)) !== null || (await this.hasChildren(remote));
    }

    async isDirectory(remote: RemotePath): Promise<boolean> {
        if (!remote.key || (await this.hasChildren(remote))) {
            return true;
        }
        if (await this.head(remote)) {
            return false;
        }
        throw new NotFoundError(formatRemote(remote));
    }

    /**
     * List a prefix. Always sorted, since S3 makes no ordering promise to
     * callers once pages are merged.
     */
    async list(remote: RemotePath, options: ListOptions = {}): Promise<string[]> {
        const base = formatRemote(remote);

        if (!(await this.isDirectory(remote))) {
            return [options.fullPath ? base : remoteBasename(remote)];
        }

        const prefix = directoryPrefix(remote);
        const names: string[] = [];

        if (options.recursive) {
            for (const object of (await this.walk(remote)).files) {
                names.push(object.key.slice(prefix.length));
            }
        } else {
            for await (const page of this.pages(remote.bucket, prefix, '/')) {
                for (const common of page.CommonPrefixes ?? []) {
                    if (common.Prefix) {
                        names.push(formatEntry({ name: common.Prefix.slice(prefix.length, -1), isDirectory: true }));
                    }
                }
                for (const object of page.Contents ?? []) {
                    if (object.Key && object.Key !== prefix) {
                        names.push(object.Key.slice(prefix.length));
                    }
                }
            }
        }

        return names.map((name) => (options.fullPath ? `${base}/${name}` : name)).sort();
    }

    /**
     * Delete an object, or every object under a prefix
     */
    async remove(remote: RemotePath, options: RemoveOptions = {}): Promise<number> {
        const path = formatRemote(remote);
        const directory = await this.isDirectory(remote);
        const walked = directory ? await this.walk(remote) : null;
        const count = walked ? walked.files.length : 1;

        if (options.dryRun) {
            this.logger.warn(`Deleting '${path}' would remove ${count} file(s)`);
            return count;
        }

        if (!walked) {
            this.logger.info(`Removing 1 file located at '${path}'`);
            await this.client.send(new DeleteObjectCommand({ Bucket: remote.bucket, Key: remote.key }));
            return count;
        }

        this.logger.info(`Removing ${count} file(s) located in directory '${path}'`);
        const keys = [...walked.files.map((object) => object.key), ...walked.markers];
        await this.deleteKeys(remote, keys);
        return count;
    }

    /**
     * Size of an object, or the sum over every object under a prefix.
     * Walks the listing each time; S3 keeps no directory totals.
     */
    async size(remote: RemotePath): Promise<number> {
        if (await this.isDirectory(remote)) {
            const { files } = await this.walk(remote);
            return files.reduce((total, object) => total + object.size, 0);
        }
        const head = await this.head(remote);
        return head?.ContentLength ?? 0;
    }

    async read(remote: RemotePath): Promise<Buffer> {
        try {
            const response = await this.client.send(new GetObjectCommand({
                Bucket: remote.bucket,
                Key: remote.key,
            }));
            if (!response.Body) {
                return Buffer.alloc(0);
            }
            return Buffer.from(await response.Body.transformToByteArray());
        } catch (error) {
            if (isNotFound(error)) {
                throw new NotFoundError(formatRemote(remote), { cause: error });
            }
            throw error;
        }
    }

    async write(remote: RemotePath, data: Uint8Array | string, options: WriteOptions = {}): Promise<void> {
        this.assertObjectKey(remote);
        await this.client.send(new PutObjectCommand({
            Bucket: remote.bucket,
            Key: remote.key,
            Body: data,
            ACL: options.acl ?? DEFAULT_ACL,
        }));
    }

    // ============ TRANSFER PRIMITIVES ============

    /**
     * Server-side copy; the bytes never leave S3
     */
    async copyObject(from: RemotePath, to: RemotePath, options: WriteOptions = {}): Promise<void> {
        this.assertObjectKey(to);
        this.logger.debug(`Copying '${formatRemote(from)}' to '${formatRemote(to)}'`);
        await this.client.send(new CopyObjectCommand({
            Bucket: to.bucket,
            Key: to.key,
            CopySource: `${from.bucket}/${encodeURIComponent(from.key)}`,
            ACL: options.acl ?? DEFAULT_ACL,
        }));
    }

    async download(from: RemotePath, localPath: string): Promise<void> {
        this.logger.debug(`Downloading '${formatRemote(from)}' to '${localPath}'`);
        const data = await this.read(from);
        await mkdir(dirname(localPath), { recursive: true });
        await writeFile(localPath, data);
    }

    async upload(localPath: string, to: RemotePath, options: WriteOptions = {}): Promise<void> {
        this.logger.debug(`Uploading '${localPath}' to '${formatRemote(to)}'`);
        await this.write(to, await readFile(localPath), options);
    }

    /**
     * Every object under the prefix, plus the pseudo-directories it implies
     */
    async walk(remote: RemotePath): Promise<PrefixWalk> {
        const prefix = directoryPrefix(remote);
        const files: ObjectSummary[] = [];
        const markers: string[] = [];
        const directories = new Set<string>();

        for await (const page of this.pages(remote.bucket, prefix)) {
            for (const object of page.Contents ?? []) {
                if (!object.Key) continue;

                const relative = object.Key.slice(prefix.length);
                if (object.Key.endsWith('/')) {
                    markers.push(object.Key);
                    if (relative) directories.add(relative.replace(/\/+$/, ''));
                    continue;
                }

                files.push({ key: object.Key, size: object.Size ?? 0 });
                const parent = relative.lastIndexOf('/');
                if (parent > 0) directories.add(relative.slice(0, parent));
            }
        }

        return { files, directories: [...directories].sort(), markers };
    }

    // ============ INTERNALS ============

    private async *pages(bucket: string, prefix: string, delimiter?: string): AsyncGenerator<ListObjectsV2CommandOutput> {
        let token: string | undefined;
        do {
            const response = await this.client.send(new ListObjectsV2Command({
                Bucket: bucket,
                Prefix: prefix,
                Delimiter: delimiter,
                ContinuationToken: token,
            }));
            yield response;
            token = response.IsTruncated ? response.NextContinuationToken : undefined;
        } while (token);
    }

    private async head(remote: RemotePath): Promise<HeadObjectCommandOutput | null> {
        if (!remote.key) return null;
        try {
            return await this.client.send(new HeadObjectCommand({ Bucket: remote.bucket, Key: remote.key }));
        } catch (error) {
            if (isNotFound(error)) return null;
            throw error;
        }
    }

    private async hasChildren(remote: RemotePath): Promise<boolean> {
        const response = await this.client.send(new ListObjectsV2Command({
            Bucket: remote.bucket,
            Prefix: directoryPrefix(remote),
            MaxKeys: 1,
        }));
        return (response.Contents?.length ?? 0) > 0 || (response.CommonPrefixes?.length ?? 0) > 0;
    }

    private async deleteKeys(remote: RemotePath, keys: string[]): Promise<void> {
        const failures: TransferFailure[] = [];
        let deleted = 0;

        for (let i = 0; i < keys.length; i += DELETE_BATCH_SIZE) {
            const batch = keys.slice(i, i + DELETE_BATCH_SIZE);
            const response = await this.client.send(new DeleteObjectsCommand({
                Bucket: remote.bucket,
                Delete: { Objects: batch.map((Key) => ({ Key })), Quiet: true },
            }));

            const errors = response.Errors ?? [];
            deleted += batch.length - errors.length;
            for (const failure of errors) {
                const path = formatRemote({ ...remote, key: failure.Key ?? '' });
                failures.push({
                    source: path,
                    destination: path,
                    error: new Error(`${failure.Code ?? 'DeleteFailed'}: ${failure.Message ?? 'unknown error'}`),
                });
            }
        }

        if (failures.length > 0) {
            throw new TransferError(formatRemote(remote), failures, deleted);
        }
    }

    private assertObjectKey(remote: RemotePath): void {
        if (!remote.key) {
            throw new InvalidPathError(formatRemote(remote), 'names a bucket, not an object');
        }
    }
}

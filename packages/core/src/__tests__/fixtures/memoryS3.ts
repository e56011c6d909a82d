/**
 * In-process S3 stand-in: an S3Client whose `send` is answered from
 * in-memory buckets through aws-sdk-client-mock.
 */

import {
    S3Client,
    CopyObjectCommand,
    DeleteObjectCommand,
    DeleteObjectsCommand,
    GetObjectCommand,
    HeadBucketCommand,
    HeadObjectCommand,
    ListObjectsV2Command,
    NoSuchBucket,
    NoSuchKey,
    NotFound,
    PutObjectCommand,
} from '@aws-sdk/client-s3';
import { mockClient } from 'aws-sdk-client-mock';

export interface StoredObject {
    body: Buffer;
    acl?: string;
}

interface ListEntry {
    key: string;
    common: boolean;
}

function toBuffer(body: unknown): Buffer {
    if (typeof body === 'string' || body instanceof Uint8Array) {
        return Buffer.from(body);
    }
    throw new Error(`Unsupported body type in memory S3: ${typeof body}`);
}

const metadata = (httpStatusCode: number) => ({ httpStatusCode });

export class MemoryS3 {
    readonly client = new S3Client({
        region: 'us-east-1',
        credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
    });
    readonly mock = mockClient(this.client);
    readonly buckets = new Map<string, Map<string, StoredObject>>();

    /** Keys whose copy, get or put fails, and whose batch delete reports an error */
    readonly failingKeys = new Set<string>();
    /** Page size for ListObjectsV2 when the caller sets no MaxKeys */
    pageSize = 1000;
    /** Artificial latency for object transfers, to observe concurrency */
    delayMs = 0;
    inFlight = 0;
    maxInFlight = 0;

    constructor(buckets: string[] = ['test-bucket']) {
        for (const bucket of buckets) this.buckets.set(bucket, new Map());
        this.install();
    }

    put(bucket: string, key: string, body: string | Uint8Array): void {
        this.bucket(bucket).set(key, { body: Buffer.from(body) });
    }

    get(bucket: string, key: string): StoredObject | undefined {
        return this.buckets.get(bucket)?.get(key);
    }

    text(bucket: string, key: string): string | undefined {
        return this.get(bucket, key)?.body.toString('utf-8');
    }

    keys(bucket: string): string[] {
        return [...this.bucket(bucket).keys()].sort();
    }

    restore(): void {
        this.mock.restore();
    }

    private bucket(name: string | undefined): Map<string, StoredObject> {
        const bucket = name === undefined ? undefined : this.buckets.get(name);
        if (!bucket) {
            throw new NoSuchBucket({ message: `The specified bucket does not exist: ${name}`, $metadata: metadata(404) });
        }
        return bucket;
    }

    private object(bucketName: string | undefined, key: string | undefined): StoredObject {
        const found = key === undefined ? undefined : this.bucket(bucketName).get(key);
        if (!found) {
            throw new NoSuchKey({ message: `The specified key does not exist: ${key}`, $metadata: metadata(404) });
        }
        return found;
    }

    private async transfer<T>(key: string | undefined, operation: () => T): Promise<T> {
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
            if (this.delayMs > 0) {
                await new Promise((resolve) => setTimeout(resolve, this.delayMs));
            }
            if (key !== undefined && this.failingKeys.has(key)) {
                throw new Error(`Injected failure for '${key}'`);
            }
            return operation();
        } finally {
            this.inFlight--;
        }
    }

    private install(): void {
        this.mock.on(HeadBucketCommand).callsFake((input) => {
            if (!input.Bucket || !this.buckets.has(input.Bucket)) {
                throw new NotFound({ message: 'Not Found', $metadata: metadata(404) });
            }
            return {};
        });

        this.mock.on(HeadObjectCommand).callsFake((input) => {
            const found = input.Key === undefined ? undefined : this.bucket(input.Bucket).get(input.Key);
            if (!found) {
                throw new NotFound({ message: 'Not Found', $metadata: metadata(404) });
            }
            return { ContentLength: found.body.length };
        });

        this.mock.on(ListObjectsV2Command).callsFake((input) => {
            const bucket = this.bucket(input.Bucket);
            const prefix = input.Prefix ?? '';
            const delimiter = input.Delimiter;

            const entries: ListEntry[] = [];
            const seen = new Set<string>();
            for (const key of [...bucket.keys()].sort()) {
                if (!key.startsWith(prefix)) continue;
                const rest = key.slice(prefix.length);
                const cut = delimiter ? rest.indexOf(delimiter) : -1;
                if (delimiter && cut !== -1) {
                    const common = prefix + rest.slice(0, cut + delimiter.length);
                    if (!seen.has(common)) {
                        seen.add(common);
                        entries.push({ key: common, common: true });
                    }
                } else {
                    entries.push({ key, common: false });
                }
            }

            const start = input.ContinuationToken ? Number(input.ContinuationToken) : 0;
            const end = start + (input.MaxKeys ?? this.pageSize);
            const page = entries.slice(start, end);
            const truncated = end < entries.length;

            return {
                Contents: page
                    .filter((entry) => !entry.common)
                    .map((entry) => ({ Key: entry.key, Size: bucket.get(entry.key)?.body.length ?? 0 })),
                CommonPrefixes: page.filter((entry) => entry.common).map((entry) => ({ Prefix: entry.key })),
                KeyCount: page.length,
                IsTruncated: truncated,
                NextContinuationToken: truncated ? String(end) : undefined,
            };
        });

        this.mock.on(GetObjectCommand).callsFake((input) =>
            this.transfer(input.Key, () => {
                const bytes = new Uint8Array(this.object(input.Bucket, input.Key).body);
                return { Body: { transformToByteArray: async () => bytes } };
            })
        );

        this.mock.on(PutObjectCommand).callsFake((input) =>
            this.transfer(input.Key, () => {
                if (input.Key === undefined) throw new Error('PutObject without a Key');
                this.bucket(input.Bucket).set(input.Key, { body: toBuffer(input.Body), acl: input.ACL });
                return {};
            })
        );

        this.mock.on(CopyObjectCommand).callsFake((input) => {
            const source = input.CopySource ?? '';
            const slash = source.indexOf('/');
            const sourceBucket = source.slice(0, slash);
            const sourceKey = decodeURIComponent(source.slice(slash + 1));
            return this.transfer(sourceKey, () => {
                if (input.Key === undefined) throw new Error('CopyObject without a Key');
                const found = this.object(sourceBucket, sourceKey);
                this.bucket(input.Bucket).set(input.Key, { body: Buffer.from(found.body), acl: input.ACL });
                return {};
            });
        });

        this.mock.on(DeleteObjectCommand).callsFake((input) => {
            if (input.Key !== undefined) this.bucket(input.Bucket).delete(input.Key);
            return {};
        });

        this.mock.on(DeleteObjectsCommand).callsFake((input) => {
            const bucket = this.bucket(input.Bucket);
            const errors: { Key: string; Code: string; Message: string }[] = [];
            for (const { Key } of input.Delete?.Objects ?? []) {
                if (Key === undefined) continue;
                if (this.failingKeys.has(Key)) {
                    errors.push({ Key, Code: 'AccessDenied', Message: 'Access Denied' });
                } else {
                    bucket.delete(Key);
                }
            }
            return { Errors: errors };
        });
    }
}

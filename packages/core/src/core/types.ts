// src/core/types.ts

import type { ObjectCannedACL, S3Client } from '@aws-sdk/client-s3';

// ============ PATHS ============

/**
 * Anything that stringifies to a path: plain strings, `file:` URLs, or
 * path objects from other libraries.
 */
export type PathInput = string | URL | { toString(): string };

export type PathKind = 'local' | 'remote';

export type RemoteScheme = 's3' | 's3a' | 's3n';

export interface LocalPath {
  kind: 'local';
  path: string;        // Normalized, `~` expanded, no trailing separator
}

export interface RemotePath {
  kind: 'remote';
  scheme: RemoteScheme;
  bucket: string;
  key: string;         // No leading or trailing '/', '' for the bucket root
}

export type ParsedPath = LocalPath | RemotePath;

// ============ LISTING ============

/**
 * One listing item. Listings return these as strings, with a trailing '/'
 * on directories.
 */
export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
}

export function formatEntry(entry: DirectoryEntry): string {
  return entry.isDirectory ? `${entry.name}/` : entry.name;
}

export interface ListOptions {
  fullPath?: boolean;   // Default: false
  recursive?: boolean;  // Default: false
}

export interface RemoveOptions {
  dryRun?: boolean;     // Default: false
}

export interface WriteOptions {
  acl?: ObjectCannedACL;
}

// ============ CALL OPTIONS ============

/**
 * Per-call S3 handle. When absent the Dispatcher's own client is used.
 */
export interface RemoteOptions {
  client?: S3Client;
}

export interface CopyOptions extends RemoteOptions, WriteOptions {
  overwrite?: boolean;            // Default: true
  includeSourceDirName?: boolean; // Default: true
  concurrency?: number;           // Default: 100
}

export interface LoadOptions extends RemoteOptions {
  format?: string;
  [codecOption: string]: unknown;
}

export interface SaveOptions extends RemoteOptions, WriteOptions {
  format?: string;
  overwrite?: boolean;            // Default: true
  [codecOption: string]: unknown;
}

// ============ TRANSFERS ============

export interface TransferItem<TSource extends ParsedPath, TDestination extends ParsedPath> {
  source: TSource;
  destination: TDestination;
}

/**
 * Built before any byte moves. `directory` is false for a single-file copy,
 * in which case `items` holds exactly one pair.
 */
export interface TransferPlan<TSource extends ParsedPath, TDestination extends ParsedPath> {
  root: TDestination;
  directory: boolean;
  items: TransferItem<TSource, TDestination>[];
  directories: TDestination[];    // Destination directories implied by the source tree
}

export const DEFAULT_CONCURRENCY = 100;
export const DEFAULT_ACL: ObjectCannedACL = 'bucket-owner-full-control';

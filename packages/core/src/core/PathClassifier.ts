// src/core/PathClassifier.ts
//
// Every public operation parses its path(s) here exactly once. Everything
// below the Dispatcher works on the resulting tagged union.

import { homedir } from 'os';
import { basename, join, normalize, posix, sep } from 'path';
import { fileURLToPath } from 'url';
import { InvalidPathError } from './errors.js';
import { LocalPath, ParsedPath, PathInput, PathKind, RemotePath, RemoteScheme } from './types.js';

export const REMOTE_SCHEMES: readonly RemoteScheme[] = ['s3', 's3a', 's3n'];

/**
 * Coerce a path-like value to a plain string.
 * `file:` URLs become filesystem paths; anything else goes through String().
 */
export function toPathString(input: PathInput): string {
  if (input instanceof URL) {
    return input.protocol === 'file:' ? fileURLToPath(input) : input.href;
  }
  return String(input);
}

function schemeOf(path: string): RemoteScheme | undefined {
  return REMOTE_SCHEMES.find((scheme) => path.startsWith(`${scheme}://`));
}

/**
 * A path is remote iff it starts literally with a recognized scheme prefix.
 */
export function classify(input: PathInput): PathKind {
  return schemeOf(toPathString(input)) ? 'remote' : 'local';
}

export function isRemotePath(input: PathInput): boolean {
  return classify(input) === 'remote';
}

/**
 * Split an s3 path into [bucket, key] without normalizing it.
 */
export function splitRemote(input: PathInput): [string, string] {
  const path = toPathString(input);
  if (!schemeOf(path)) {
    throw new InvalidPathError(path);
  }
  const parts = path.split('/');
  return [parts[2] ?? '', parts.slice(3).join('/')];
}

/**
 * Expand a leading `~`, collapse `.`/`..`/duplicate separators and drop
 * a trailing separator.
 */
export function normalizeLocal(input: PathInput): string {
  let path = toPathString(input);
  if (path === '~' || path.startsWith('~/') || path.startsWith(`~${sep}`)) {
    path = homedir() + path.slice(1);
  }
  const normalized = normalize(path);
  if (normalized.length > 1 && normalized.endsWith(sep)) {
    return normalized.slice(0, -1);
  }
  return normalized;
}

/**
 * Strip the scheme and collapse redundant separators, keeping `bucket/key`.
 */
export function normalizeRemote(input: PathInput): string {
  const path = toPathString(input);
  const scheme = schemeOf(path);
  const body = scheme ? path.slice(scheme.length + 3) : path;
  const collapsed = posix.normalize(body.replace(/^\/+/, ''));
  return collapsed.replace(/^(\.\/)+/, '').replace(/\/+$/, '').replace(/^\.$/, '');
}

/**
 * True when a `..` segment climbs into or above the bucket segment
 */
function escapesBucket(body: string): boolean {
  let depth = 0;
  for (const segment of body.split('/')) {
    if (segment === '' || segment === '.') continue;
    if (segment === '..') {
      if (depth <= 1) return true;
      depth--;
    } else {
      depth++;
    }
  }
  return false;
}

export function parsePath(input: PathInput): ParsedPath {
  const path = toPathString(input);
  const scheme = schemeOf(path);

  if (!scheme) {
    const local: LocalPath = { kind: 'local', path: normalizeLocal(path) };
    return local;
  }

  if (escapesBucket(path.slice(scheme.length + 3))) {
    throw new InvalidPathError(path, 'escapes its bucket');
  }
  const normalized = normalizeRemote(path);
  const slash = normalized.indexOf('/');
  const bucket = slash === -1 ? normalized : normalized.slice(0, slash);
  const key = slash === -1 ? '' : normalized.slice(slash + 1);

  if (!bucket) {
    throw new InvalidPathError(path, 'has no bucket');
  }

  const remote: RemotePath = { kind: 'remote', scheme, bucket, key };
  return remote;
}

/**
 * Parse a path that must be remote.
 */
export function parseRemote(input: PathInput): RemotePath {
  const parsed = parsePath(input);
  if (parsed.kind !== 'remote') {
    throw new InvalidPathError(parsed.path);
  }
  return parsed;
}

export function formatRemote(remote: RemotePath): string {
  const base = `${remote.scheme}://${remote.bucket}`;
  return remote.key ? `${base}/${remote.key}` : base;
}

export function formatPath(parsed: ParsedPath): string {
  return parsed.kind === 'remote' ? formatRemote(parsed) : parsed.path;
}

/**
 * Append relative segments to a remote path's key.
 */
export function joinRemote(remote: RemotePath, ...segments: string[]): RemotePath {
  const key = posix
    .join(remote.key, ...segments)
    .replace(/^(\.\/)+/, '')
    .replace(/^\.$/, '')
    .replace(/\/+$/, '');
  return { ...remote, key };
}

export function remoteBasename(remote: RemotePath): string {
  return remote.key ? posix.basename(remote.key) : remote.bucket;
}

/**
 * Append relative '/'-separated segments to either kind of path.
 */
export function joinPath<TPath extends ParsedPath>(parsed: TPath, ...segments: string[]): TPath;
export function joinPath(parsed: ParsedPath, ...segments: string[]): ParsedPath {
  if (parsed.kind === 'remote') {
    return joinRemote(parsed, ...segments);
  }
  const local: LocalPath = { kind: 'local', path: normalizeLocal(join(parsed.path, ...segments)) };
  return local;
}

/**
 * Lower-cased extension of the last path segment, without the dot.
 */
export function extensionOf(parsed: ParsedPath): string {
  const name = parsed.kind === 'remote' ? remoteBasename(parsed) : basename(parsed.path);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot + 1).toLowerCase() : '';
}

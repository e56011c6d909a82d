import { CodecError } from '../../core/errors.js';
import { ListOptions, ParsedPath } from '../../core/types.js';

/**
 * Byte-level access handed to codecs. Paths are already parsed, and the
 * store routes them to the matching backend.
 */
export interface CodecStore {
    read(path: ParsedPath): Promise<Buffer>;
    write(path: ParsedPath, data: Uint8Array | string): Promise<void>;
    exists(path: ParsedPath): Promise<boolean>;
    isDirectory(path: ParsedPath): Promise<boolean>;
    list(path: ParsedPath, options?: ListOptions): Promise<string[]>;
}

export type CodecOptions = Record<string, unknown>;

export interface CodecContext {
    path: ParsedPath;
    store: CodecStore;
    options: CodecOptions;
}

export interface IObjectCodec {
    /**
     * Format name accepted by load/save
     */
    readonly name: string;

    /**
     * Extensions (without the dot) that select this codec when no format is given
     */
    readonly extensions: readonly string[];

    /**
     * 'directory' codecs write a tree of files under the path, so an
     * existing directory there is replaced on overwrite
     */
    readonly layout: 'file' | 'directory';

    load(context: CodecContext): Promise<unknown>;

    save(value: unknown, context: CodecContext): Promise<void>;
}

// ============ OPTION READERS ============

export function stringOption(codec: string, options: CodecOptions, name: string): string | undefined {
    const value = options[name];
    if (value === undefined || typeof value === 'string') return value;
    throw new CodecError(codec, `Option '${name}' must be a string`);
}

export function booleanOption(codec: string, options: CodecOptions, name: string): boolean | undefined {
    const value = options[name];
    if (value === undefined || typeof value === 'boolean') return value;
    throw new CodecError(codec, `Option '${name}' must be a boolean`);
}

export function numberOption(codec: string, options: CodecOptions, name: string): number | undefined {
    const value = options[name];
    if (value === undefined || (typeof value === 'number' && Number.isFinite(value))) return value;
    throw new CodecError(codec, `Option '${name}' must be a finite number`);
}

export function stringArrayOption(codec: string, options: CodecOptions, name: string): string[] | undefined {
    const value = options[name];
    if (value === undefined) return undefined;
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
        return value;
    }
    throw new CodecError(codec, `Option '${name}' must be an array of strings`);
}

// ============ VALUE GUARDS ============

export type Row = Record<string, unknown>;

export function isRow(value: unknown): value is Row {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Tabular codecs take an array of plain objects, one per row.
 */
export function assertRows(codec: string, value: unknown, path?: string): Row[] {
    if (!Array.isArray(value) || !value.every(isRow)) {
        throw new CodecError(codec, 'Value must be an array of row objects', path);
    }
    return value;
}

/**
 * Column names in first-seen order across every row
 */
export function columnsOf(rows: readonly Row[]): string[] {
    const columns = new Set<string>();
    for (const row of rows) {
        for (const key of Object.keys(row)) columns.add(key);
    }
    return [...columns];
}

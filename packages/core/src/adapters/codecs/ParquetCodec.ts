import { parquetReadObjects } from 'hyparquet';
import { parquetWriteBuffer } from 'hyparquet-writer';
import {
    IObjectCodec,
    CodecContext,
    CodecStore,
    Row,
    assertRows,
    columnsOf,
    stringArrayOption,
} from './IObjectCodec.js';
import { CodecError } from '../../core/errors.js';
import { formatPath, joinPath } from '../../core/PathClassifier.js';
import { ParsedPath } from '../../core/types.js';
import { generateToken } from '../../utils/format.js';

const PARQUET_SUFFIX = '.parquet';

/**
 * `col=value` segments of a dataset-relative file path
 */
export function partitionValues(relative: string): Record<string, string> {
    const values: Record<string, string> = {};
    const segments = relative.split('/').slice(0, -1);
    for (const segment of segments) {
        const eq = segment.indexOf('=');
        if (eq > 0) {
            values[decodeURIComponent(segment.slice(0, eq))] = decodeURIComponent(segment.slice(eq + 1));
        }
    }
    return values;
}

function partitionSegment(column: string, value: unknown): string {
    const text = value === null || value === undefined ? '__HIVE_DEFAULT_PARTITION__' : String(value);
    return `${encodeURIComponent(column)}=${encodeURIComponent(text)}`;
}

function toArrayBuffer(data: Uint8Array): ArrayBuffer {
    const copy = new ArrayBuffer(data.byteLength);
    new Uint8Array(copy).set(data);
    return copy;
}

/**
 * Columnar datasets: a directory of part files, optionally partitioned
 * hive-style into `col=value/` sub-directories. A single parquet file also
 * loads.
 *
 * Save options: `partitionCols` (partition order), `columns` (subset to keep).
 * Load options: `columns` (subset to read), `filters` (partition column ->
 * accepted values).
 */
export class ParquetCodec implements IObjectCodec {
    readonly name = 'parquet';
    readonly extensions = ['parquet', 'parq'];
    readonly layout = 'directory' as const;

    async load({ path, store, options }: CodecContext): Promise<Row[]> {
        const columns = stringArrayOption(this.name, options, 'columns');
        const filters = this.readFilters(options.filters);

        if (!(await store.isDirectory(path))) {
            return this.readFile(store, path, columns, {});
        }

        const parts = (await store.list(path, { recursive: true }))
            .filter((relative) => relative.endsWith(PARQUET_SUFFIX));

        const rows: Row[] = [];
        for (const relative of parts) {
            const partitions = partitionValues(relative);
            if (!this.accepts(partitions, filters)) continue;
            rows.push(...(await this.readFile(store, joinPath(path, relative), columns, partitions)));
        }
        return rows;
    }

    async save(value: unknown, { path, store, options }: CodecContext): Promise<void> {
        const rows = assertRows(this.name, value, formatPath(path));
        const partitionCols = stringArrayOption(this.name, options, 'partitionCols') ?? [];
        const selected = stringArrayOption(this.name, options, 'columns') ?? columnsOf(rows);

        for (const column of partitionCols) {
            if (!selected.includes(column)) {
                throw new CodecError(this.name, `Partition column '${column}' is not among the columns`, formatPath(path));
            }
        }

        const dataColumns = selected.filter((column) => !partitionCols.includes(column));
        if (dataColumns.length === 0) {
            throw new CodecError(this.name, 'At least one non-partition column is required', formatPath(path));
        }

        const groups = new Map<string, Row[]>();
        for (const row of rows) {
            const directory = partitionCols.map((column) => partitionSegment(column, row[column])).join('/');
            const group = groups.get(directory);
            if (group) group.push(row);
            else groups.set(directory, [row]);
        }
        if (groups.size === 0) {
            groups.set('', []);
        }

        const fileName = `part-${generateToken(8)}${PARQUET_SUFFIX}`;
        for (const [directory, group] of groups) {
            const buffer = parquetWriteBuffer({
                columnData: dataColumns.map((name) => ({
                    name,
                    data: group.map((row) => row[name] ?? null),
                })),
            });
            const target = directory ? joinPath(path, directory, fileName) : joinPath(path, fileName);
            await store.write(target, new Uint8Array(buffer));
        }
    }

    private async readFile(
        store: CodecStore,
        path: ParsedPath,
        columns: string[] | undefined,
        partitions: Record<string, string>
    ): Promise<Row[]> {
        const file = toArrayBuffer(await store.read(path));
        const fileColumns = columns?.filter((column) => !(column in partitions));

        let rows: Row[];
        try {
            rows = await parquetReadObjects({ file, columns: fileColumns });
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new CodecError(this.name, reason, formatPath(path));
        }

        const attached = Object.entries(partitions).filter(([column]) => !columns || columns.includes(column));
        if (attached.length === 0) return rows;
        return rows.map((row) => ({ ...row, ...Object.fromEntries(attached) }));
    }

    private readFilters(value: unknown): Map<string, Set<string>> {
        const filters = new Map<string, Set<string>>();
        if (value === undefined) return filters;
        if (typeof value !== 'object' || value === null || Array.isArray(value)) {
            throw new CodecError(this.name, "Option 'filters' must map partition columns to accepted values");
        }
        for (const [column, accepted] of Object.entries(value)) {
            const values: unknown[] = Array.isArray(accepted) ? accepted : [accepted];
            filters.set(column, new Set(values.map(String)));
        }
        return filters;
    }

    private accepts(partitions: Record<string, string>, filters: Map<string, Set<string>>): boolean {
        for (const [column, accepted] of filters) {
            const value = partitions[column];
            if (value === undefined || !accepted.has(value)) return false;
        }
        return true;
    }
}

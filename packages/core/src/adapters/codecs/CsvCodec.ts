import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import {
    IObjectCodec,
    CodecContext,
    assertRows,
    booleanOption,
    columnsOf,
    stringArrayOption,
    stringOption,
} from './IObjectCodec.js';
import { CodecError } from '../../core/errors.js';
import { formatPath } from '../../core/PathClassifier.js';

/**
 * CSV with a header row, as an array of row objects.
 *
 * Options:
 * - `delimiter` (default ',')
 * - `cast`: convert numeric cells on load (default false, every cell a string)
 * - `columns`: column order on save (default: first-seen order across rows)
 */
export class CsvCodec implements IObjectCodec {
    readonly name = 'csv';
    readonly extensions = ['csv'];
    readonly layout = 'file' as const;

    async load({ path, store, options }: CodecContext): Promise<Record<string, unknown>[]> {
        const delimiter = stringOption(this.name, options, 'delimiter') ?? ',';
        const cast = booleanOption(this.name, options, 'cast') ?? false;
        const data = await store.read(path);

        let parsed: unknown;
        try {
            parsed = parse(data, { columns: true, delimiter, cast, skip_empty_lines: true, bom: true });
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new CodecError(this.name, reason, formatPath(path));
        }
        return assertRows(this.name, parsed, formatPath(path));
    }

    async save(value: unknown, { path, store, options }: CodecContext): Promise<void> {
        const rows = assertRows(this.name, value, formatPath(path));
        const delimiter = stringOption(this.name, options, 'delimiter') ?? ',';
        const columns = stringArrayOption(this.name, options, 'columns') ?? columnsOf(rows);

        await store.write(path, stringify(rows, { header: true, columns, delimiter }));
    }
}

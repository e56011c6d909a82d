import { IObjectCodec, CodecContext, numberOption } from './IObjectCodec.js';
import { CodecError } from '../../core/errors.js';
import { formatPath } from '../../core/PathClassifier.js';

/**
 * JSON documents. Options: `indent` (spaces) on save.
 */
export class JsonCodec implements IObjectCodec {
    readonly name = 'json';
    readonly extensions = ['json'];
    readonly layout = 'file' as const;

    async load({ path, store }: CodecContext): Promise<unknown> {
        const text = (await store.read(path)).toString('utf-8');
        try {
            return JSON.parse(text);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new CodecError(this.name, `Invalid JSON: ${reason}`, formatPath(path));
        }
    }

    async save(value: unknown, { path, store, options }: CodecContext): Promise<void> {
        const indent = numberOption(this.name, options, 'indent');
        const text = JSON.stringify(value, null, indent);
        // JSON.stringify returns undefined for functions, symbols and undefined
        if (typeof text !== 'string') {
            throw new CodecError(this.name, `Value of type ${typeof value} cannot be serialized`, formatPath(path));
        }
        await store.write(path, text);
    }
}

import { IObjectCodec, CodecContext } from './IObjectCodec.js';
import { CodecError } from '../../core/errors.js';
import { formatPath } from '../../core/PathClassifier.js';

/**
 * Bytes in, bytes out. Strings are accepted on save and written as UTF-8.
 */
export class RawCodec implements IObjectCodec {
    readonly name = 'raw';
    readonly extensions = ['txt'];
    readonly layout = 'file' as const;

    async load({ path, store }: CodecContext): Promise<Buffer> {
        return store.read(path);
    }

    async save(value: unknown, { path, store }: CodecContext): Promise<void> {
        if (typeof value !== 'string' && !(value instanceof Uint8Array)) {
            throw new CodecError(this.name, `Value must be a string or bytes, got ${typeof value}`, formatPath(path));
        }
        await store.write(path, value);
    }
}

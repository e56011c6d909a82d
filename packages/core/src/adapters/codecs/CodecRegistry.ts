import { IObjectCodec } from './IObjectCodec.js';
import { RawCodec } from './RawCodec.js';
import { JsonCodec } from './JsonCodec.js';
import { CsvCodec } from './CsvCodec.js';
import { ParquetCodec } from './ParquetCodec.js';
import { UnsupportedFormatError } from '../../core/errors.js';
import { extensionOf, formatPath } from '../../core/PathClassifier.js';
import { ParsedPath } from '../../core/types.js';

/**
 * Format name -> codec. Populated once; lookups never guess.
 */
export class CodecRegistry {
    private byName = new Map<string, IObjectCodec>();
    private byExtension = new Map<string, IObjectCodec>();

    constructor(codecs: readonly IObjectCodec[] = []) {
        for (const codec of codecs) this.register(codec);
    }

    register(codec: IObjectCodec): this {
        this.byName.set(codec.name, codec);
        for (const extension of codec.extensions) {
            this.byExtension.set(extension.toLowerCase(), codec);
        }
        return this;
    }

    get formats(): string[] {
        return [...this.byName.keys()].sort();
    }

    /**
     * Pick the codec for an explicit format, or infer it from the extension
     */
    resolve(path: ParsedPath, format?: string): IObjectCodec {
        if (format !== undefined) {
            const codec = this.byName.get(format);
            if (!codec) throw new UnsupportedFormatError(formatPath(path), format);
            return codec;
        }

        const extension = extensionOf(path);
        const codec = extension ? this.byExtension.get(extension) : undefined;
        if (!codec) {
            throw new UnsupportedFormatError(formatPath(path));
        }
        return codec;
    }
}

export function createDefaultCodecs(): CodecRegistry {
    return new CodecRegistry([new RawCodec(), new JsonCodec(), new CsvCodec(), new ParquetCodec()]);
}

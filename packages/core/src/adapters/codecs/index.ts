/**
 * Object codecs for load/save.
 */

export {
    type IObjectCodec,
    type CodecContext,
    type CodecOptions,
    type CodecStore,
    type Row,
    assertRows,
    columnsOf,
} from './IObjectCodec.js';
export { RawCodec } from './RawCodec.js';
export { JsonCodec } from './JsonCodec.js';
export { CsvCodec } from './CsvCodec.js';
export { ParquetCodec, partitionValues } from './ParquetCodec.js';
export { CodecRegistry, createDefaultCodecs } from './CodecRegistry.js';

import type { RecordValue } from '../types/record';

/**
 * Structured serialization used for segments, checkpoints and cache files.
 *
 * Encoded values must be self-delimiting: many values written back to back
 * into one file are read back one at a time by `decodeAll`.
 */
export interface RecordCodec {
  /** Encode one value. Throws CodecError for values outside the model. */
  encode(value: RecordValue): Uint8Array;

  /** Decode exactly one value. */
  decode(bytes: Uint8Array): RecordValue;

  /** Decode concatenated values lazily, one per pull. */
  decodeAll(bytes: Uint8Array): Generator<RecordValue, void, undefined>;
}

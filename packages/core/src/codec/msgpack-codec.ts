/**
 * MsgpackCodec — MessagePack encoding for records.
 *
 * MessagePack values carry their own length, so segments and cache files
 * are plain concatenations of encoded values with no extra framing.
 */

import { encode, decode, decodeMulti } from '@msgpack/msgpack';
import type { RecordCodec } from '../interfaces/codec';
import type { RecordValue } from '../types/record';
import { CodecError } from '../types/errors';
import { findValueIssue, isRecordValue } from './value-model';

export class MsgpackCodec implements RecordCodec {
  encode(value: RecordValue): Uint8Array {
    // Records built from JSON.parse or spreads can still carry undefined or Dates
    const issue = findValueIssue(value);
    if (issue) {
      throw new CodecError(issue.path, issue.reason);
    }
    return encode(value);
  }

  decode(bytes: Uint8Array): RecordValue {
    let value: unknown;
    try {
      value = decode(bytes);
    } catch (err) {
      throw new CodecError('', 'Malformed or truncated data', err);
    }
    return checkDecoded(value, '$');
  }

  *decodeAll(bytes: Uint8Array): Generator<RecordValue, void, undefined> {
    const values = decodeMulti(bytes);
    let index = 0;
    while (true) {
      let step: IteratorResult<unknown>;
      try {
        step = values.next();
      } catch (err) {
        throw new CodecError(`#${index}`, 'Malformed or truncated data', err);
      }
      if (step.done) return;
      yield checkDecoded(step.value, `#${index}`);
      index++;
    }
  }
}

function checkDecoded(value: unknown, path: string): RecordValue {
  if (isRecordValue(value)) return value;
  const issue = findValueIssue(value, path);
  throw new CodecError(issue?.path ?? path, `Decoded ${issue?.reason ?? 'value is not supported'}`);
}

/**
 * Record value model.
 *
 * Everything that goes through a codec is one of these. Maps have string
 * keys; records in a queue are maps. No schema is enforced, so records of
 * different shapes may sit next to each other in one segment.
 */
export type RecordValue =
  | null
  | boolean
  | number
  | string
  | RecordValue[]
  | { [key: string]: RecordValue };

/** A single queue record. */
export type QueueRecord = { [key: string]: RecordValue };

/**
 * Position of one record inside a queue.
 * `filename` is the segment's base name, `index` is zero-based within it.
 */
export interface ReadPosition {
  readonly filename: string;
  readonly index: number;
}

/** What a Source yields: `[filename, index, record]`. */
export type SourceEntry = readonly [filename: string, index: number, record: QueueRecord];

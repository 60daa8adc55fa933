// Types
export type { RecordValue, QueueRecord, ReadPosition, SourceEntry } from './types/record';
export {
  DiskSpoolError,
  InvalidNameError,
  ConfigError,
  DirectoryError,
  ClosedSinkError,
  ClosedProjectError,
  AsyncScopeError,
  SegmentReadError,
  CleanupError,
  CheckpointError,
  CodecError,
  CacheWriteError,
  CacheReadError,
} from './types/errors';

// Interfaces
export type { RecordCodec } from './interfaces/codec';
export type { CheckpointStore } from './interfaces/checkpoint-store';
export type { EventBus } from './interfaces/event-bus';

// Codec
export { MsgpackCodec } from './codec/msgpack-codec';
export { isRecordValue, isQueueRecord, isRecordMap, findValueIssue, type ValueIssue } from './codec/value-model';

// Queues
export { Project, type ProjectOptions, type OpenSourceOptions } from './impl/project';
export { Sink, DEFAULT_ROTATION_INTERVAL_MS, type SinkOptions } from './impl/sink';
export { Source, type SourceOptions, type UnlinkTarget } from './impl/source';
export { FileCheckpointStore, type FileCheckpointStoreOptions } from './impl/file-checkpoint-store';
export { MemoryCheckpointStore } from './impl/memory-checkpoint-store';
export { StateFolder, VARS_FILENAME, type StateFolderOptions } from './impl/state-folder';

// Events
export {
  EventDispatcher,
  type EventDispatcherOptions,
  type DispatchedEvent,
  type EventListener,
  type EventType,
} from './impl/event-dispatcher';
export { logEvents, formatEvent } from './impl/console-logger';

// Utilities
export {
  now,
  type Clock,
  assertValidName,
  boundaryStart,
  formatStamp,
  segmentName,
  segmentMatcher,
  errorCode,
  ensureWritableDir,
  atomicWriteFileSync,
  unlinkIfExists,
  writeAll,
  assertSettings,
  formatIssues,
  validateCacheSettings,
} from './utils';

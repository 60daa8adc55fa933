/**
 * Base error for all diskspool errors.
 */
export class DiskSpoolError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DiskSpoolError';
  }
}

/**
 * Queue, state folder or cache name cannot be used as a file name.
 */
export class InvalidNameError extends DiskSpoolError {
  constructor(
    public readonly value: string,
    reason: string
  ) {
    super('INVALID_NAME', `Invalid name "${value}": ${reason}`);
    this.name = 'InvalidNameError';
  }
}

/**
 * Options object failed validation.
 */
export class ConfigError extends DiskSpoolError {
  constructor(
    public readonly issues: string[]
  ) {
    super('INVALID_CONFIG', `Invalid options: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Project directory cannot be created or is not writable.
 */
export class DirectoryError extends DiskSpoolError {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super('DIRECTORY_UNAVAILABLE', `Directory "${path}" cannot be created or is not writable`, { cause });
    this.name = 'DirectoryError';
  }
}

/**
 * Write attempted on a sink that has been closed.
 */
export class ClosedSinkError extends DiskSpoolError {
  constructor(public readonly queue: string) {
    super('SINK_CLOSED', `Sink for queue "${queue}" is closed`);
    this.name = 'ClosedSinkError';
  }
}

/**
 * Project used after close(); sinks and sources opened then would never be
 * closed or checkpointed.
 */
export class ClosedProjectError extends DiskSpoolError {
  constructor(public readonly dir: string) {
    super('PROJECT_CLOSED', `Project "${dir}" is closed`);
    this.name = 'ClosedProjectError';
  }
}

/**
 * Project.use was given a function that returned a promise.
 */
export class AsyncScopeError extends DiskSpoolError {
  constructor(public readonly dir: string) {
    super('ASYNC_SCOPE', `Project.use("${dir}") takes a synchronous function; the project closes when it returns`);
    this.name = 'AsyncScopeError';
  }
}

/**
 * A segment could not be decoded.
 */
export class SegmentReadError extends DiskSpoolError {
  constructor(
    public readonly filename: string,
    public readonly index: number,
    cause: unknown
  ) {
    super('SEGMENT_UNREADABLE', `Cannot read record ${index} of segment "${filename}"`, { cause });
    this.name = 'SegmentReadError';
  }
}

/**
 * Unlinking a consumed segment failed.
 */
export class CleanupError extends DiskSpoolError {
  constructor(
    public readonly filename: string,
    cause: unknown
  ) {
    super('CLEANUP_FAILED', `Cannot remove segment "${filename}"`, { cause });
    this.name = 'CleanupError';
  }
}

/**
 * Stored checkpoint is unreadable or malformed.
 */
export class CheckpointError extends DiskSpoolError {
  constructor(
    public readonly queue: string,
    reason: string,
    cause?: unknown
  ) {
    super('CHECKPOINT_INVALID', `Checkpoint for queue "${queue}" is invalid: ${reason}`, { cause });
    this.name = 'CheckpointError';
  }
}

/**
 * Value is outside the record value model, or bytes do not decode to one.
 */
export class CodecError extends DiskSpoolError {
  constructor(
    public readonly path: string,
    reason: string,
    cause?: unknown
  ) {
    super('CODEC_ERROR', path ? `${reason} at ${path}` : reason, { cause });
    this.name = 'CodecError';
  }
}

// === Cache Errors ===

/**
 * Cache file could not be created, written or promoted.
 * Callers never see this thrown from a cached call; the cache falls back
 * to passing the producer's values through.
 */
export class CacheWriteError extends DiskSpoolError {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super('CACHE_WRITE_FAILED', `Cannot write cache file "${path}"`, { cause });
    this.name = 'CacheWriteError';
  }
}

/**
 * Cache file is corrupt or holds values the cache does not accept.
 * Treated as a miss by cached calls.
 */
export class CacheReadError extends DiskSpoolError {
  constructor(
    public readonly path: string,
    reason: string,
    cause?: unknown
  ) {
    super('CACHE_READ_FAILED', `Cannot read cache file "${path}": ${reason}`, { cause });
    this.name = 'CacheReadError';
  }
}

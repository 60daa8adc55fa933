/**
 * Optional event publishing.
 * Sinks, sources, checkpoint stores and caches report what they do on disk
 * through these hooks. All methods are optional — subscribe only to what you need.
 *
 * Categories:
 * - Segments: open, rotate, close, unlink
 * - Checkpoints: load, save
 * - Cache: hit, miss, written, discarded, cleared, read/write failures
 */
export interface EventBus {
  // ── Segments ──────────────────────────────────────────────────────
  onSegmentOpened?(e: { queue: string; filename: string; boundary: number }): void;

  /**
   * Emitted when a write crosses a rotation boundary.
   */
  onSegmentRotated?(e: { queue: string; from: string; to: string }): void;

  onSegmentClosed?(e: { queue: string; filename: string; records: number }): void;

  /**
   * Emitted after `unlinkTo` removed consumed segments.
   */
  onSegmentsUnlinked?(e: { queue: string; filenames: string[] }): void;

  // ── Checkpoints ───────────────────────────────────────────────────
  onCheckpointLoaded?(e: { queue: string; filename: string; index: number }): void;
  onCheckpointSaved?(e: { queue: string; filename: string; index: number }): void;

  // ── Cache ─────────────────────────────────────────────────────────
  onCacheHit?(e: { key: string; path: string }): void;
  onCacheMiss?(e: { key: string; path: string }): void;

  /**
   * Emitted when a populating pass completed and the cache file was promoted.
   */
  onCacheWritten?(e: { key: string; path: string; count: number }): void;

  /**
   * Emitted when a populating pass ended early (producer error or the caller
   * stopped iterating) and its temporary file was removed.
   */
  onCacheDiscarded?(e: { key: string; path: string; reason: 'error' | 'incomplete' }): void;

  onCacheCleared?(e: { key: string; path: string }): void;
  onCacheReadFailed?(e: { key: string; path: string; error: { code: string; message: string } }): void;
  onCacheWriteFailed?(e: { key: string; path: string; error: { code: string; message: string } }): void;
}

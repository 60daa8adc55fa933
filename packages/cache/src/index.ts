export {
  DiskCache,
  cachedIter,
  cachedIterOf,
  CACHE_FILE_PREFIX,
  CACHE_FILE_SUFFIX,
  type CacheOptions,
  type DiskCacheOptions,
  type CachedIter,
  type Producer,
} from './disk-cache';
export { save, load, scan, tee, type StorageOptions } from './storage';
export { shortDigest, shortDigester, stableStringify, sha256Hex } from './digest';
export { first, countIter } from './iter';

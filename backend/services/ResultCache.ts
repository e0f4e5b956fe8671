import type {
  CacheStats,
  ClassificationResult,
  Clock,
  DecodedImage,
  ImageFingerprinter
} from '../types/index.js';
import { hammingDistance } from './ai/ImageFingerprint.js';

export interface ResultCacheOptions {
  maxSize: number;
  ttlSeconds: number;
  fingerprinter: ImageFingerprinter;
  now?: Clock;
}

interface CacheEntry<T> {
  result: T;
  insertedAt: number;
}

/**
 * Cache for analyzed images, keyed by perceptual fingerprint.
 *
 * Map insertion order doubles as the recency list: a hit deletes and re-inserts the entry
 * so the first key is always the least recently used one.
 */
export class ResultCache<T = ClassificationResult> {
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly fingerprinter: ImageFingerprinter;
  private readonly now: Clock;
  private readonly entries = new Map<string, CacheEntry<T>>();
  private hits = 0;
  private misses = 0;

  constructor(options: ResultCacheOptions) {
    this.maxSize = Math.max(0, Math.floor(options.maxSize));
    this.ttlMs = Math.max(0, options.ttlSeconds) * 1000;
    this.fingerprinter = options.fingerprinter;
    this.now = options.now ?? Date.now;
  }

  fingerprint(image: DecodedImage): Promise<string> {
    return this.fingerprinter.fingerprint(image);
  }

  /**
   * Returns the cached result, or undefined when absent or expired.
   * Expired entries are evicted here rather than by a sweeper.
   */
  lookup(fingerprint: string): T | undefined {
    const entry = this.entries.get(fingerprint);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.now() - entry.insertedAt >= this.ttlMs) {
      this.entries.delete(fingerprint);
      this.misses++;
      return undefined;
    }

    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, entry);
    this.hits++;
    return entry.result;
  }

  store(fingerprint: string, result: T): void {
    if (this.maxSize === 0) return;

    if (this.entries.has(fingerprint)) {
      this.entries.delete(fingerprint);
    } else {
      while (this.entries.size >= this.maxSize) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
      }
    }

    this.entries.set(fingerprint, { result, insertedAt: this.now() });
  }

  /**
   * Near-duplicate check: fingerprints within `threshold` differing bits are the same picture.
   * A helper for callers comparing fingerprints; `lookup` itself only matches keys exactly.
   */
  isSimilar(a: string, b: string, threshold = 5): boolean {
    return hammingDistance(a, b) < threshold;
  }

  stats(): CacheStats {
    const observations = this.hits + this.misses;
    return {
      size: this.entries.size,
      capacity: this.maxSize,
      ttlSeconds: this.ttlMs / 1000,
      hits: this.hits,
      misses: this.misses,
      hitRate: observations > 0 ? this.hits / observations : 0
    };
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }
}

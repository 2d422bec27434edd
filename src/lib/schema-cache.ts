/**
 * Schema Cache - derive each pattern's Schema at most once
 *
 * Keyed by flags + pattern text. Schemas are frozen and never change, so
 * entries have no TTL; the cache is only bounded by size, evicting the least
 * recently used entry. Failed derivations are not cached.
 */

import { z } from "zod";
import { analyzePattern } from "./regex/analyzer.ts";
import type { Schema } from "./regex/types.ts";

export const SchemaCacheConfigSchema = z.object({
  /** Maximum number of schemas kept (0 disables caching) */
  maxSize: z.number().int().min(0),
});

export type SchemaCacheConfig = z.infer<typeof SchemaCacheConfigSchema>;

const DEFAULT_CONFIG: SchemaCacheConfig = {
  maxSize: 256,
};

export interface SchemaCacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  hit_rate: number;
}

export class SchemaCache {
  // Map iteration order doubles as recency order: oldest first
  private cache = new Map<string, Schema>();
  private config: SchemaCacheConfig;

  private totalHits = 0;
  private totalMisses = 0;

  constructor(config: Partial<SchemaCacheConfig> = {}) {
    this.config = SchemaCacheConfigSchema.parse({ ...DEFAULT_CONFIG, ...config });
  }

  /** Cached schema for `source`, deriving it on a miss */
  get(source: string, flags = ""): Schema {
    const key = this.keyOf(source, flags);
    const cached = this.cache.get(key);

    if (cached) {
      this.totalHits++;
      // Re-insert to mark as most recently used
      this.cache.delete(key);
      this.cache.set(key, cached);
      return cached;
    }

    this.totalMisses++;
    const schema = analyzePattern(source, flags);
    this.store(key, schema);
    return schema;
  }

  has(source: string, flags = ""): boolean {
    return this.cache.has(this.keyOf(source, flags));
  }

  get size(): number {
    return this.cache.size;
  }

  getStats(): SchemaCacheStats {
    const lookups = this.totalHits + this.totalMisses;
    return {
      size: this.cache.size,
      maxSize: this.config.maxSize,
      hits: this.totalHits,
      misses: this.totalMisses,
      hit_rate: lookups > 0 ? this.totalHits / lookups : 0,
    };
  }

  /** Clear all entries and reset stats. Returns the number of entries dropped. */
  clear(): number {
    const count = this.cache.size;
    this.cache.clear();
    this.totalHits = 0;
    this.totalMisses = 0;
    return count;
  }

  /** Update configuration; shrinking evicts the oldest entries */
  configure(config: Partial<SchemaCacheConfig>): void {
    this.config = SchemaCacheConfigSchema.parse({ ...this.config, ...config });
    this.evictOverflow();
  }

  private store(key: string, schema: Schema): void {
    if (this.config.maxSize === 0) return;
    this.cache.set(key, schema);
    this.evictOverflow();
  }

  private evictOverflow(): void {
    while (this.cache.size > this.config.maxSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) return;
      this.cache.delete(oldest.value);
    }
  }

  private keyOf(source: string, flags: string): string {
    return `${flags}/${source}`;
  }
}

// Singleton instance
export const schemaCache = new SchemaCache();

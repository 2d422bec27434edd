/**
 * Main barrel export for src/lib/
 */

// Regex analysis, extraction and matching
export * from "./regex/index.ts";
// Schema cache
export {
  SchemaCache,
  type SchemaCacheConfig,
  SchemaCacheConfigSchema,
  type SchemaCacheStats,
  schemaCache,
} from "./schema-cache.ts";

import { z } from 'zod';

/**
 * A crate a mapping needs alongside its targets, e.g. `tokio` for an async
 * HTTP client.
 */
export const RequiredDepSchema = z.object({
  crate: z.string().min(1),
  features: z.array(z.string()).optional(),
  reason: z.string().optional(),
});

export type RequiredDep = z.infer<typeof RequiredDepSchema>;

export const LibrarySchema = z.object({
  url: z.string().min(1),
  lang: z.string().min(1),
  /** Reason the library is flagged as vulnerable */
  unsafe: z.string().optional(),
  crate_name: z.string().optional(),
  tags: z.array(z.string()).optional(),
});

export type Library = z.infer<typeof LibrarySchema>;

export const MappingSchema = z.object({
  source: z.string().min(1),
  /** Library IDs; `<None>` marks a source with no known equivalent */
  targets: z.array(z.string()),
  category: z.string().optional(),
  confidence: z.number().min(0).max(1).optional(),
  requires: z.array(RequiredDepSchema).optional(),
});

export type Mapping = z.infer<typeof MappingSchema>;

/**
 * Library catalog data file (data/catalog.json).
 */
export const CatalogFileSchema = z.object({
  libs: z.record(z.string(), LibrarySchema),
  mappings: z.array(MappingSchema),
});

export type CatalogFile = z.infer<typeof CatalogFileSchema>;

import { z } from 'zod';

// ---------------------------------------------------------------------------
// STAC object schemas. Unknown fields (extensions, summaries, ...) are kept.
// ---------------------------------------------------------------------------

export const stacLinkSchema = z
  .object({
    rel: z.string(),
    href: z.string(),
    type: z.string().optional(),
    title: z.string().optional(),
  })
  .passthrough();

export const stacAssetSchema = z
  .object({
    href: z.string(),
    type: z.string().optional(),
    title: z.string().optional(),
    roles: z.array(z.string()).optional(),
  })
  .passthrough();

export const stacItemSchema = z
  .object({
    type: z.literal('Feature'),
    stac_version: z.string(),
    id: z.string(),
    geometry: z.unknown(),
    bbox: z.array(z.number()).optional(),
    properties: z.record(z.unknown()),
    links: z.array(stacLinkSchema),
    assets: z.record(stacAssetSchema),
    collection: z.string().optional(),
  })
  .passthrough();

export const stacCatalogSchema = z
  .object({
    type: z.literal('Catalog'),
    stac_version: z.string(),
    id: z.string(),
    description: z.string(),
    title: z.string().optional(),
    links: z.array(stacLinkSchema),
  })
  .passthrough();

export const stacCollectionSchema = z
  .object({
    type: z.literal('Collection'),
    stac_version: z.string(),
    id: z.string(),
    description: z.string(),
    title: z.string().optional(),
    license: z.string().optional(),
    extent: z.unknown(),
    links: z.array(stacLinkSchema),
  })
  .passthrough();

export const stacObjectSchema = z.discriminatedUnion('type', [
  stacCatalogSchema,
  stacCollectionSchema,
  stacItemSchema,
]);

export type StacLink = z.infer<typeof stacLinkSchema>;
export type StacAsset = z.infer<typeof stacAssetSchema>;
export type StacItem = z.infer<typeof stacItemSchema>;
export type StacCatalogDocument = z.infer<typeof stacCatalogSchema>;
export type StacCollection = z.infer<typeof stacCollectionSchema>;
export type StacObject = z.infer<typeof stacObjectSchema>;

/** Catalog-like documents that can hold children and items. */
export type StacContainer = StacCatalogDocument | StacCollection;

/** GeoJSON FeatureCollection of items, as produced when no collection exists. */
export interface StacItemCollection {
  type: 'FeatureCollection';
  features: StacItem[];
  [key: string]: unknown;
}

/** Object-storage endpoint and keys used to read and write STAC documents. */
export interface StorageCredentials {
  endpoint: string;
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
  bucket: string;
}

/** Raised when a document is not valid JSON or not a recognised STAC object. */
export class StacFormatError extends Error {
  constructor(
    readonly href: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${href}: ${message}`, options);
    this.name = 'StacFormatError';
  }
}

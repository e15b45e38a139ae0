import { logger } from '@stageout/shared';
import {
  StacCatalog,
  StacFormatError,
  type LocatedItem,
  type StacAsset,
  type StacCollection,
  type StacIO,
  type StacItem,
  type StacItemCollection,
  type StorageCredentials,
} from '@stageout/stac';

const log = logger.child({ module: 'consolidate' });

export const STORAGE_PLATFORM = 'EOEPCA';
export const STORAGE_TIER = 'Standard';

export type NoCollectionReason = 'catalog-unreadable' | 'catalog-malformed' | 'no-collection-or-items';

export type ConsolidationResult =
  | { kind: 'collection'; source: 'catalog'; document: StacCollection; selfHref: string }
  | { kind: 'collection'; source: 'items'; document: StacItemCollection; selfHref: string }
  | { kind: 'none'; reason: NoCollectionReason; error?: unknown };

export interface ConsolidateOptions {
  catalogUri: string;
  collectionId: string;
  credentials: StorageCredentials;
  io: StacIO;
}

export function normalizeCatalogUri(uri: string): string {
  return uri.startsWith('s3://') ? uri : `s3://${uri}`;
}

function readFailure(err: unknown): NoCollectionReason {
  return err instanceof StacFormatError ? 'catalog-malformed' : 'catalog-unreadable';
}

export function annotateAsset(asset: StacAsset, credentials: StorageCredentials): StacAsset {
  return {
    ...asset,
    'storage:platform': STORAGE_PLATFORM,
    'storage:requester_pays': false,
    'storage:tier': STORAGE_TIER,
    'storage:region': credentials.region,
    'storage:endpoint': credentials.endpoint,
  };
}

/** Copy of `item` assigned to `collectionId` with storage metadata on every asset. */
export function restampItem(item: StacItem, collectionId: string, credentials: StorageCredentials): StacItem {
  const copy = structuredClone(item);
  const assets: Record<string, StacAsset> = {};
  for (const [key, asset] of Object.entries(copy.assets)) {
    assets[key] = annotateAsset(asset, credentials);
  }
  return { ...copy, assets, collection: collectionId };
}

async function findFirstCollection(
  catalog: StacCatalog,
): Promise<{ href: string; document: StacCollection } | undefined> {
  for await (const child of catalog.getAllCollections()) {
    if (child.document.type === 'Collection') {
      return { href: child.selfHref, document: child.document };
    }
  }
  return undefined;
}

/**
 * Turn the catalog a workflow wrote into a single collection whose id is
 * `collectionId`: the catalog's first collection when it has one, otherwise
 * a FeatureCollection of every item it links to.
 */
export async function consolidateOutputs(options: ConsolidateOptions): Promise<ConsolidationResult> {
  const { collectionId, credentials, io } = options;
  const href = normalizeCatalogUri(options.catalogUri);
  log.info({ href }, 'reading output catalog');

  let catalog: StacCatalog;
  try {
    catalog = await StacCatalog.open(href, io);
  } catch (err) {
    log.error({ err, href }, 'failed to read output catalog');
    return { kind: 'none', reason: readFailure(err), error: err };
  }

  log.info({ collectionId }, 'creating collection');
  try {
    const found = await findFirstCollection(catalog);
    if (found) {
      log.info({ href: found.href }, 'got collection from outputs');
      return {
        kind: 'collection',
        source: 'catalog',
        document: { ...found.document, id: collectionId },
        selfHref: found.href,
      };
    }
  } catch (err) {
    log.error({ err, href }, 'failed to read collections, falling back to items');
  }

  let located: LocatedItem[];
  try {
    located = await catalog.getAllItems();
  } catch (err) {
    log.error({ err, href }, 'failed to read items');
    return { kind: 'none', reason: readFailure(err), error: err };
  }
  if (located.length === 0) {
    log.error({ href }, 'output catalog holds no collection and no items');
    return { kind: 'none', reason: 'no-collection-or-items' };
  }

  const features = located.map(({ item }) => restampItem(item, collectionId, credentials));
  log.info({ count: features.length }, 'created collection from items');
  return {
    kind: 'collection',
    source: 'items',
    document: { type: 'FeatureCollection', features, id: collectionId },
    selfHref: catalog.selfHref,
  };
}

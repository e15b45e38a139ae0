import type { StacCatalogDocument, StacCollection, StacIO, StacItem } from '@stageout/stac';

/** StacIO over a map of href -> document, recording every read. */
export class MemoryStacIO implements StacIO {
  readonly files = new Map<string, string>();
  readonly reads: string[] = [];
  destroyed = 0;

  constructor(docs: Record<string, unknown> = {}) {
    for (const [href, doc] of Object.entries(docs)) {
      this.files.set(href, typeof doc === 'string' ? doc : JSON.stringify(doc));
    }
  }

  async readText(href: string): Promise<string> {
    this.reads.push(href);
    const text = this.files.get(href);
    if (text === undefined) throw new Error(`NoSuchKey: ${href}`);
    return text;
  }

  async writeText(href: string, text: string): Promise<void> {
    this.files.set(href, text);
  }

  destroy(): void {
    this.destroyed += 1;
  }
}

type Link = { rel: string; href: string };

export function catalogDoc(id: string, links: Link[]): StacCatalogDocument {
  return { type: 'Catalog', stac_version: '1.0.0', id, description: `${id} catalog`, links };
}

export function collectionDoc(id: string, links: Link[]): StacCollection {
  return {
    type: 'Collection',
    stac_version: '1.0.0',
    id,
    description: `${id} collection`,
    license: 'proprietary',
    extent: { spatial: { bbox: [[-10, 40, 10, 60]] }, temporal: { interval: [['2024-01-01T00:00:00Z', null]] } },
    links,
  };
}

export function itemDoc(id: string, assets: Record<string, { href: string; type?: string }>): StacItem {
  return {
    type: 'Feature',
    stac_version: '1.0.0',
    id,
    geometry: { type: 'Point', coordinates: [1, 50] },
    properties: { datetime: '2024-05-01T10:00:00Z' },
    links: [{ rel: 'root', href: '../catalog.json' }],
    assets,
  };
}

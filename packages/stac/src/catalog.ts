import { dirname, isAbsolute, join, posix } from 'node:path';
import { logger } from '@stageout/shared';
import { parseS3Uri, type StacIO } from './io.js';
import {
  StacFormatError,
  stacObjectSchema,
  type StacContainer,
  type StacItem,
  type StacObject,
} from './types.js';

const log = logger.child({ module: 'stac-catalog' });

const URI_SCHEME = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Resolve a link href against the href of the document that holds it.
 * Works for URI bases (s3://, https://, file://) and plain filesystem paths.
 * Object keys under s3:// are joined as raw paths, without percent-encoding.
 */
export function resolveHref(href: string, base: string): string {
  if (URI_SCHEME.test(href)) return href;
  if (base.startsWith('s3://')) {
    const { bucket, key } = parseS3Uri(base);
    const resolved = href.startsWith('/') ? posix.normalize(href) : posix.join(posix.dirname(`/${key}`), href);
    return `s3://${bucket}${resolved}`;
  }
  if (URI_SCHEME.test(base)) return new URL(href, base).toString();
  if (isAbsolute(href)) return href;
  return join(dirname(base), href);
}

/** Read and validate any STAC document. */
export async function readStacObject(href: string, io: StacIO): Promise<StacObject> {
  const text = await io.readText(href);
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new StacFormatError(href, 'invalid JSON', { cause: err });
  }
  const parsed = stacObjectSchema.safeParse(json);
  if (!parsed.success) {
    throw new StacFormatError(href, `not a STAC object: ${parsed.error.message}`, { cause: parsed.error });
  }
  return parsed.data;
}

export interface LocatedItem {
  href: string;
  item: StacItem;
}

/**
 * A catalog or collection read from storage, with lazy traversal of its
 * `child` and `item` links.
 */
export class StacCatalog {
  private children?: Promise<StacCatalog[]>;

  /**
   * @param ancestors - hrefs of the catalogs above this one; a child link back
   * to any of them is a cycle.
   */
  constructor(
    readonly href: string,
    readonly document: StacContainer,
    private readonly io: StacIO,
    private readonly ancestors: ReadonlySet<string> = new Set(),
  ) {}

  static async open(href: string, io: StacIO, ancestors?: ReadonlySet<string>): Promise<StacCatalog> {
    const doc = await readStacObject(href, io);
    if (doc.type === 'Feature') {
      throw new StacFormatError(href, `expected a catalog or collection, found item ${doc.id}`);
    }
    return new StacCatalog(href, doc, io, ancestors);
  }

  get id(): string {
    return this.document.id;
  }

  get isCollection(): boolean {
    return this.document.type === 'Collection';
  }

  /** The location this document was read from. */
  get selfHref(): string {
    return this.href;
  }

  linkHrefs(rel: string): string[] {
    return this.document.links.filter((l) => l.rel === rel).map((l) => resolveHref(l.href, this.href));
  }

  getChildren(): Promise<StacCatalog[]> {
    this.children ??= this.openChildren();
    return this.children;
  }

  private async openChildren(): Promise<StacCatalog[]> {
    const lineage = new Set(this.ancestors).add(this.href);
    const hrefs = this.linkHrefs('child');
    const cyclic = hrefs.find((href) => lineage.has(href));
    if (cyclic !== undefined) {
      throw new StacFormatError(cyclic, `child link from ${this.href} forms a cycle`);
    }
    return Promise.all(hrefs.map((href) => StacCatalog.open(href, this.io, lineage)));
  }

  /** Child collections of this catalog, then those of every descendant. */
  async *getAllCollections(): AsyncGenerator<StacCatalog> {
    const children = await this.getChildren();
    for (const child of children) {
      if (child.isCollection) yield child;
    }
    for (const child of children) {
      yield* child.getAllCollections();
    }
  }

  async getItems(): Promise<LocatedItem[]> {
    const items: LocatedItem[] = [];
    for (const href of this.linkHrefs('item')) {
      const doc = await readStacObject(href, this.io);
      if (doc.type !== 'Feature') {
        throw new StacFormatError(href, `item link points at a ${doc.type}`);
      }
      items.push({ href, item: doc });
    }
    return items;
  }

  /** Items linked from this catalog, then from every descendant. */
  async getAllItems(): Promise<LocatedItem[]> {
    const items = await this.getItems();
    for (const child of await this.getChildren()) {
      items.push(...(await child.getAllItems()));
    }
    log.debug({ catalog: this.id, count: items.length }, 'items collected');
    return items;
  }
}

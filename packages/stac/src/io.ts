import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { logger } from '@stageout/shared';
import type { StorageCredentials } from './types.js';

const log = logger.child({ module: 'stac-io' });

const HTTP_URL = /^https?:\/\//i;

/** Reads and writes the text of STAC documents addressed by href. */
export interface StacIO {
  readText(href: string): Promise<string>;
  writeText(href: string, text: string): Promise<void>;
  /** Release clients held by this instance. */
  destroy?(): void;
}

function toPath(href: string): string {
  return href.startsWith('file://') ? fileURLToPath(href) : href;
}

/** HTTP(S) reads through fetch; everything else is a local file. */
export class DefaultStacIO implements StacIO {
  async readText(href: string): Promise<string> {
    if (HTTP_URL.test(href)) {
      const res = await fetch(href);
      if (!res.ok) {
        throw new Error(`GET ${href} returned ${res.status}`);
      }
      return res.text();
    }
    return readFile(toPath(href), 'utf-8');
  }

  async writeText(href: string, text: string): Promise<void> {
    if (HTTP_URL.test(href)) {
      throw new Error(`cannot write STAC document over HTTP: ${href}`);
    }
    const path = toPath(href);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, text, 'utf-8');
  }
}

export interface S3Location {
  bucket: string;
  key: string;
}

const S3_URI = /^s3:\/\/([^/]+)\/?(.*)$/s;

/** Split an `s3://bucket/key` URI. The key is kept verbatim: S3 keys are not percent-encoded. */
export function parseS3Uri(uri: string): S3Location {
  const match = S3_URI.exec(uri);
  if (!match) {
    throw new Error(`not an s3 URI: ${uri}`);
  }
  const [, bucket = '', key = ''] = match;
  return { bucket, key };
}

export interface S3StacIOOptions {
  /** Bucket that replaces the URI host on every request. */
  accessPoint?: string;
  /** Handles hrefs that are not s3:// URIs. */
  fallback?: StacIO;
  client?: S3Client;
}

/**
 * STAC I/O over S3-compatible object storage: path-style addressing, SigV4.
 *
 * When both keys are present they sign the requests; otherwise the SDK's
 * default credential chain applies (e.g. a pod service account).
 */
export class S3StacIO implements StacIO {
  private readonly client: S3Client;
  private readonly accessPoint: string | undefined;
  private readonly fallback: StacIO;

  constructor(credentials: StorageCredentials, options: S3StacIOOptions = {}) {
    const { accessKeyId, secretAccessKey } = credentials;
    this.client =
      options.client ??
      new S3Client({
        region: credentials.region || undefined,
        endpoint: credentials.endpoint || undefined,
        forcePathStyle: true,
        credentials: accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined,
      });
    this.accessPoint = options.accessPoint || undefined;
    this.fallback = options.fallback ?? new DefaultStacIO();
  }

  private locate(href: string): S3Location {
    const { bucket, key } = parseS3Uri(href);
    return { bucket: this.accessPoint ?? bucket, key };
  }

  async readText(href: string): Promise<string> {
    if (!href.startsWith('s3://')) {
      return this.fallback.readText(href);
    }
    const { bucket, key } = this.locate(href);
    log.info({ bucket, key }, 'reading object');
    const res = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!res.Body) {
      throw new Error(`empty body for s3://${bucket}/${key}`);
    }
    return res.Body.transformToString('utf-8');
  }

  async writeText(href: string, text: string): Promise<void> {
    if (!href.startsWith('s3://')) {
      return this.fallback.writeText(href, text);
    }
    const { bucket, key } = this.locate(href);
    log.info({ bucket, key }, 'writing object');
    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: Buffer.from(text, 'utf-8'),
        ContentType: 'application/geo+json',
      }),
    );
  }

  destroy(): void {
    this.client.destroy();
  }
}

import { z } from 'zod';
import { logger } from '@stageout/shared';

const log = logger.child({ module: 'workspace-client' });

const workspaceDetailsSchema = z.object({
  storage: z.object({
    credentials: z.object({
      endpoint: z.string(),
      access: z.string(),
      secret: z.string(),
      region: z.string(),
      bucketname: z.string(),
    }),
  }),
});

export type WorkspaceStorageCredentials = z.infer<typeof workspaceDetailsSchema>['storage']['credentials'];

export type WorkspaceLookup =
  | { ok: true; credentials: WorkspaceStorageCredentials }
  | { ok: false; status: number; body: string };

export interface WorkspaceClientOptions {
  baseUrl: string;
  prefix: string;
  /** Bearer token of the user the process runs for. */
  token: string;
}

export interface WorkspaceClient {
  workspaceName(username: string): string;
  getStorageCredentials(username: string): Promise<WorkspaceLookup>;
  /** Register a collection document; resolves to the response status. */
  registerCollection(username: string, collection: Record<string, unknown>): Promise<number>;
  /** Register a processing result by URL; resolves to the response status. */
  registerResult(username: string, url: string): Promise<number>;
}

export function createWorkspaceClient(options: WorkspaceClientOptions): WorkspaceClient {
  const baseUrl = options.baseUrl.replace(/\/+$/, '');

  function headers(): Record<string, string> {
    return {
      Accept: 'application/json',
      Authorization: `Bearer ${options.token}`,
    };
  }

  function workspaceName(username: string): string {
    return `${options.prefix}-${username}`;
  }

  function workspaceUrl(username: string): string {
    return `${baseUrl}/workspaces/${workspaceName(username)}`;
  }

  async function post(url: string, body: unknown): Promise<number> {
    const res = await fetch(url, {
      method: 'POST',
      headers: { ...headers(), 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
    return res.status;
  }

  return {
    workspaceName,

    async getStorageCredentials(username: string): Promise<WorkspaceLookup> {
      const url = workspaceUrl(username);
      log.info({ url }, 'looking up workspace storage');
      const res = await fetch(url, { headers: headers() });
      if (!res.ok) {
        const body = await res.text().catch(() => '');
        return { ok: false, status: res.status, body };
      }
      const details = workspaceDetailsSchema.parse(await res.json());
      return { ok: true, credentials: details.storage.credentials };
    },

    async registerCollection(username: string, collection: Record<string, unknown>): Promise<number> {
      return post(`${workspaceUrl(username)}/register-json`, collection);
    },

    async registerResult(username: string, url: string): Promise<number> {
      return post(`${workspaceUrl(username)}/register`, { type: 'stac-item', url });
    },
  };
}

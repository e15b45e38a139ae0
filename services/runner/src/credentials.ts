import { logger } from '@stageout/shared';
import type { StageParameters } from './config.js';
import type { WorkspaceClient } from './workspace-client.js';

const log = logger.child({ module: 'credentials' });

export interface CredentialResolution {
  params: StageParameters;
  /** True when the stage-out storage belongs to the user's workspace. */
  useWorkspace: boolean;
}

/**
 * Swap the stage-out storage for the user's workspace storage when the
 * workspace service knows it. Without a client, or on a non-2xx lookup, the
 * statically configured storage stays in place.
 */
export async function resolveStorageCredentials(
  params: StageParameters,
  client: WorkspaceClient | undefined,
  username: string,
): Promise<CredentialResolution> {
  if (!client) {
    log.info('using pre-configured storage details');
    return { params, useWorkspace: false };
  }

  log.info({ workspace: client.workspaceName(username) }, 'looking up storage details in workspace');
  const lookup = await client.getStorageCredentials(username);
  if (!lookup.ok) {
    log.error({ status: lookup.status, body: lookup.body }, 'problem connecting with the workspace API');
    log.info('using pre-configured storage details');
    return { params, useWorkspace: false };
  }

  const { credentials } = lookup;
  log.info({ endpoint: credentials.endpoint, bucket: credentials.bucketname }, 'using workspace storage');
  return {
    params: {
      ...params,
      stageOut: {
        ...params.stageOut,
        serviceUrl: credentials.endpoint,
        accessKeyId: credentials.access,
        secretAccessKey: credentials.secret,
        region: credentials.region,
        output: credentials.bucketname,
      },
    },
    useWorkspace: true,
  };
}

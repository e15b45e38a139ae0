import { logger } from '@stageout/shared';
import type { StacIO, StorageCredentials } from '@stageout/stac';
import { consolidateOutputs, type ConsolidationResult } from './consolidate.js';
import type { WorkspaceClient } from './workspace-client.js';

const log = logger.child({ module: 'publisher' });

export interface WorkspaceRegistration {
  client: WorkspaceClient;
  username: string;
}

export interface PublishOptions {
  catalogUri: string;
  collectionId: string;
  credentials: StorageCredentials;
  io: StacIO;
  /** Present only when the storage was resolved through the workspace. */
  registration?: WorkspaceRegistration;
}

export interface PublishOutcome {
  /** JSON handed back to the host as the process output; `{}` when empty. */
  featureCollection: string;
  result: ConsolidationResult;
}

export async function publishResults(options: PublishOptions): Promise<PublishOutcome> {
  const result = await consolidateOutputs(options);
  if (result.kind === 'none') {
    log.error({ reason: result.reason }, 'output collection is empty');
    return { featureCollection: JSON.stringify({}, null, 2), result };
  }

  const featureCollection = JSON.stringify(result.document, null, 2);
  const { registration } = options;
  if (registration) {
    const { client, username } = registration;
    log.info({ workspace: client.workspaceName(username) }, 'registering collection in workspace');
    const collectionStatus = await client.registerCollection(username, result.document);
    log.info({ status: collectionStatus }, 'register collection response');

    const resultStatus = await client.registerResult(username, result.selfHref);
    log.info({ status: resultStatus, url: result.selfHref }, 'register processing results response');
  }

  return { featureCollection, result };
}

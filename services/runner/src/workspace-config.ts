import * as k8s from '@kubernetes/client-node';
import { logger } from '@stageout/shared';

const log = logger.child({ module: 'workspace-config' });

export const WORKSPACE_CONFIG_MAP = 'workspace-config';
export const ACCESS_POINT_KEY = 'S3_BUCKET_WORKSPACE';

export function workspaceNamespace(workspaceName: string): string {
  return `ws-${workspaceName}`;
}

/** Per-workspace settings published in the cluster. */
export interface WorkspaceConfigSource {
  /** Stage-out bucket for the workspace, if one is configured. */
  getAccessPoint(workspaceName: string): Promise<string | undefined>;
}

/**
 * Read the workspace ConfigMap with the pod's in-cluster service account.
 * API errors (missing namespace, missing ConfigMap, RBAC) mean "no access point".
 */
export function createWorkspaceConfigSource(api?: k8s.CoreV1Api): WorkspaceConfigSource {
  let coreApi = api;

  function getApi(): k8s.CoreV1Api {
    if (!coreApi) {
      const kc = new k8s.KubeConfig();
      kc.loadFromCluster();
      coreApi = kc.makeApiClient(k8s.CoreV1Api);
    }
    return coreApi;
  }

  return {
    async getAccessPoint(workspaceName: string): Promise<string | undefined> {
      const namespace = workspaceNamespace(workspaceName);
      const client = getApi();
      try {
        const configMap = await client.readNamespacedConfigMap({ name: WORKSPACE_CONFIG_MAP, namespace });
        const accessPoint = configMap.data?.[ACCESS_POINT_KEY];
        log.info({ namespace, accessPoint }, 'found access point');
        return accessPoint;
      } catch (err) {
        if (err instanceof k8s.ApiException) {
          log.info({ namespace, code: err.code }, 'workspace config not available');
          return undefined;
        }
        throw err;
      }
    },
  };
}

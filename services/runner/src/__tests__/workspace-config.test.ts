import { describe, it, expect, vi, afterEach } from 'vitest';

// ---------------------------------------------------------------------------
// Hoisted mock references
// ---------------------------------------------------------------------------

const { mockReadNamespacedConfigMap, mockLoadFromCluster, MockApiException } = vi.hoisted(() => {
  class MockApiException extends Error {
    constructor(
      public code: number,
      message: string,
    ) {
      super(message);
    }
  }
  return {
    mockReadNamespacedConfigMap: vi.fn(),
    mockLoadFromCluster: vi.fn(),
    MockApiException,
  };
});

vi.mock('@kubernetes/client-node', () => ({
  KubeConfig: vi.fn().mockImplementation(() => ({
    loadFromCluster: mockLoadFromCluster,
    makeApiClient: vi.fn().mockReturnValue({ readNamespacedConfigMap: mockReadNamespacedConfigMap }),
  })),
  CoreV1Api: class CoreV1Api {},
  ApiException: MockApiException,
}));

vi.mock('@stageout/shared', () => ({
  logger: {
    child: () => ({
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    }),
  },
}));

import { createWorkspaceConfigSource, workspaceNamespace } from '../workspace-config.js';

afterEach(() => {
  vi.clearAllMocks();
});

describe('workspaceNamespace', () => {
  it('prefixes the workspace name with ws-', () => {
    expect(workspaceNamespace('alice')).toBe('ws-alice');
  });
});

describe('WorkspaceConfigSource.getAccessPoint', () => {
  it('reads S3_BUCKET_WORKSPACE from the workspace ConfigMap', async () => {
    mockReadNamespacedConfigMap.mockResolvedValue({ data: { S3_BUCKET_WORKSPACE: 'ws-alice-bucket' } });
    const source = createWorkspaceConfigSource();

    const accessPoint = await source.getAccessPoint('alice');

    expect(accessPoint).toBe('ws-alice-bucket');
    expect(mockLoadFromCluster).toHaveBeenCalledTimes(1);
    expect(mockReadNamespacedConfigMap).toHaveBeenCalledWith({ name: 'workspace-config', namespace: 'ws-alice' });
  });

  it('loads the cluster config only once', async () => {
    mockReadNamespacedConfigMap.mockResolvedValue({ data: {} });
    const source = createWorkspaceConfigSource();

    await source.getAccessPoint('alice');
    await source.getAccessPoint('bob');

    expect(mockLoadFromCluster).toHaveBeenCalledTimes(1);
  });

  it('returns undefined when the ConfigMap has no data', async () => {
    mockReadNamespacedConfigMap.mockResolvedValue({});
    const source = createWorkspaceConfigSource();
    expect(await source.getAccessPoint('alice')).toBeUndefined();
  });

  it('returns undefined on a Kubernetes API error', async () => {
    mockReadNamespacedConfigMap.mockRejectedValue(new MockApiException(404, 'configmaps "workspace-config" not found'));
    const source = createWorkspaceConfigSource();
    expect(await source.getAccessPoint('default')).toBeUndefined();
  });

  it('propagates other errors', async () => {
    mockReadNamespacedConfigMap.mockRejectedValue(new Error('socket hang up'));
    const source = createWorkspaceConfigSource();
    await expect(source.getAccessPoint('alice')).rejects.toThrow('socket hang up');
  });
});

import { z } from 'zod';
import type { StorageCredentials } from '@stageout/stac';

// ---------------------------------------------------------------------------
// Host configuration, validated once when the handler is built
// ---------------------------------------------------------------------------

const stringMap = z.record(z.string());

export const executionConfSchema = z
  .object({
    main: z
      .object({ tmpUrl: z.string().default(''), tmpPath: z.string().default('') })
      .passthrough()
      .default({}),
    lenv: z
      .object({ usid: z.string().default(''), Identifier: z.string().default('') })
      .passthrough()
      .default({}),
    eoepca: z
      .object({
        domain: z.string().default(''),
        workspace_url: z.string().default(''),
        workspace_prefix: z.string().default(''),
      })
      .passthrough()
      .default({}),
    auth_env: z.object({ jwt: z.string().default('') }).passthrough().default({}),
    pod_env_vars: stringMap.default({}),
    pod_node_selector: stringMap.default({}),
    additional_parameters: z.record(z.unknown()).default({}),
  })
  .passthrough();

export type ExecutionSettings = z.infer<typeof executionConfSchema>;

export function parseExecutionSettings(conf: unknown): ExecutionSettings {
  return executionConfSchema.parse(conf);
}

// ---------------------------------------------------------------------------
// Stage-in / stage-out parameters
// ---------------------------------------------------------------------------

export const DEFAULT_S3_SERVICE_URL = 'http://s3-service.zoo.svc.cluster.local:9000';
export const DEFAULT_ACCESS_KEY_ID = 'minio-admin';
export const DEFAULT_SECRET_ACCESS_KEY = 'minio-secret-password';
export const DEFAULT_REGION = 'RegionOne';
export const PROCESSING_RESULTS = 'processing-results';

export interface S3Endpoint {
  serviceUrl: string;
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
}

export interface StageOutParameters extends S3Endpoint {
  /** Output bucket. */
  output: string;
  workspace: string;
  pulsarUrl?: string;
  accessPoint?: string;
}

export interface StageParameters {
  stageIn: S3Endpoint;
  stageOut: StageOutParameters;
  workspaceDomain?: string;
  collectionId: string;
  process?: string;
}

function endpointFromEnv(env: NodeJS.ProcessEnv, prefix: 'STAGEIN' | 'STAGEOUT'): S3Endpoint {
  return {
    serviceUrl: env[`${prefix}_AWS_SERVICEURL`] ?? DEFAULT_S3_SERVICE_URL,
    accessKeyId: env[`${prefix}_AWS_ACCESS_KEY_ID`] ?? DEFAULT_ACCESS_KEY_ID,
    secretAccessKey: env[`${prefix}_AWS_SECRET_ACCESS_KEY`] ?? DEFAULT_SECRET_ACCESS_KEY,
    region: env[`${prefix}_AWS_REGION`] ?? DEFAULT_REGION,
  };
}

/** Statically configured storage, overridable per variable from the environment. */
export function loadStageDefaults(env: NodeJS.ProcessEnv = process.env): StageParameters {
  return {
    stageIn: endpointFromEnv(env, 'STAGEIN'),
    stageOut: {
      ...endpointFromEnv(env, 'STAGEOUT'),
      output: env.STAGEOUT_OUTPUT ?? 'eoepca',
      workspace: env.STAGEOUT_WORKSPACE ?? 'default',
      pulsarUrl: env.STAGEOUT_PULSAR_URL,
      accessPoint: env.STAGEOUT_ACCESS_POINT,
    },
    workspaceDomain: env.WORKSPACE_DOMAIN,
    collectionId: '',
  };
}

/**
 * Flatten parameters into the key space the CWL stage-in/stage-out steps
 * read. Unset values are left out.
 */
export function toAdditionalParameters(params: StageParameters): Record<string, string> {
  const { stageIn, stageOut } = params;
  const flat: Record<string, string | undefined> = {
    STAGEIN_AWS_SERVICEURL: stageIn.serviceUrl,
    STAGEIN_AWS_ACCESS_KEY_ID: stageIn.accessKeyId,
    STAGEIN_AWS_SECRET_ACCESS_KEY: stageIn.secretAccessKey,
    STAGEIN_AWS_REGION: stageIn.region,
    STAGEOUT_AWS_SERVICEURL: stageOut.serviceUrl,
    STAGEOUT_AWS_ACCESS_KEY_ID: stageOut.accessKeyId,
    STAGEOUT_AWS_SECRET_ACCESS_KEY: stageOut.secretAccessKey,
    STAGEOUT_AWS_REGION: stageOut.region,
    STAGEOUT_OUTPUT: stageOut.output,
    STAGEOUT_WORKSPACE: stageOut.workspace,
    STAGEOUT_PULSAR_URL: stageOut.pulsarUrl,
    STAGEOUT_ACCESS_POINT: stageOut.accessPoint,
    WORKSPACE_DOMAIN: params.workspaceDomain,
    collection_id: params.collectionId,
    process: params.process,
  };
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(flat)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export function toStorageCredentials(params: StageParameters): StorageCredentials {
  const { stageOut } = params;
  return {
    endpoint: stageOut.serviceUrl,
    accessKeyId: stageOut.accessKeyId,
    secretAccessKey: stageOut.secretAccessKey,
    region: stageOut.region,
    bucket: stageOut.output,
  };
}

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import { z } from 'zod';
import { logger, withSpan } from '@stageout/shared';
import { S3StacIO, type StacIO, type StorageCredentials } from '@stageout/stac';
import {
  PROCESSING_RESULTS,
  loadStageDefaults,
  parseExecutionSettings,
  toAdditionalParameters,
  toStorageCredentials,
  type ExecutionSettings,
  type StageParameters,
} from './config.js';
import { resolveStorageCredentials } from './credentials.js';
import { decodeTokenClaims, getUserName } from './identity.js';
import { publishResults } from './publisher.js';
import { withoutHttpProxy } from './proxy-env.js';
import type { ExecutionHandler, HostConf, HostInputs } from './runner-contract.js';
import {
  createWorkspaceClient,
  type WorkspaceClient,
  type WorkspaceClientOptions,
} from './workspace-client.js';
import { createWorkspaceConfigSource, type WorkspaceConfigSource } from './workspace-config.js';

const log = logger.child({ module: 'execution-handler' });

export const DEFAULT_SECRETS_PATH = '/assets/pod_imagePullSecrets.yaml';

const postHookOutputSchema = z.object({ StacCatalogUri: z.string() }).passthrough();

export interface ExecutionHandlerDeps {
  workspaceConfig?: WorkspaceConfigSource;
  createWorkspaceClient?: (options: WorkspaceClientOptions) => WorkspaceClient;
  createStacIO?: (credentials: StorageCredentials, accessPoint: string | undefined) => StacIO;
  /** Environment holding HTTP_PROXY and the stage defaults. */
  env?: NodeJS.ProcessEnv;
  secretsPath?: string;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function joinUrl(base: string, ...parts: string[]): string {
  const segments = parts.map((p) => p.replace(/^\/+|\/+$/g, ''));
  return [base.replace(/\/+$/, ''), ...segments].filter((s) => s !== '').join('/');
}

/**
 * Hooks run by the workflow engine around a CWL execution: resolve the
 * stage-out storage before the run, collect and register its STAC outputs
 * after it.
 */
export class StageOutExecutionHandler implements ExecutionHandler {
  readonly settings: ExecutionSettings;
  readonly workspaceName: string;
  params: StageParameters;
  useWorkspace = false;
  username = '';
  featureCollection: string | undefined;

  private readonly token: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly workspaceConfig: WorkspaceConfigSource;
  private readonly deps: ExecutionHandlerDeps;
  private workspaceClient?: WorkspaceClient;

  constructor(
    private readonly conf: HostConf,
    inputs: HostInputs,
    deps: ExecutionHandlerDeps = {},
  ) {
    this.settings = parseExecutionSettings(conf);
    this.deps = deps;
    this.env = deps.env ?? process.env;
    this.workspaceConfig = deps.workspaceConfig ?? createWorkspaceConfigSource();

    const workspace = inputs.workspace?.value;
    this.workspaceName = typeof workspace === 'string' && workspace !== '' ? workspace : 'default';
    this.token = this.settings.auth_env.jwt;
    this.params = loadStageDefaults(this.env);
  }

  /** Client for the workspace service, when both its URL and prefix are configured. */
  private getWorkspaceClient(): WorkspaceClient | undefined {
    const { workspace_url: baseUrl, workspace_prefix: prefix } = this.settings.eoepca;
    if (!baseUrl || !prefix) return undefined;
    this.workspaceClient ??= (this.deps.createWorkspaceClient ?? createWorkspaceClient)({
      baseUrl,
      prefix,
      token: this.token,
    });
    return this.workspaceClient;
  }

  private createStacIO(credentials: StorageCredentials, accessPoint: string | undefined): StacIO {
    if (this.deps.createStacIO) return this.deps.createStacIO(credentials, accessPoint);
    return new S3StacIO(credentials, { accessPoint });
  }

  private runHook<T>(name: string, fn: () => Promise<T>): Promise<T> {
    return withSpan(`hook.${name}`, { workspace: this.workspaceName }, () =>
      withoutHttpProxy(async () => {
        try {
          return await fn();
        } catch (err) {
          log.error({ err, hook: name }, 'hook failed');
          throw err;
        }
      }, this.env),
    );
  }

  async preExecutionHook(): Promise<void> {
    await this.runHook('pre-execution', async () => {
      log.info('pre execution hook');

      const accessPoint = await this.workspaceConfig.getAccessPoint(this.workspaceName);

      if (this.token) {
        this.username = getUserName(decodeTokenClaims(this.token));
      }

      const resolution = await resolveStorageCredentials(this.params, this.getWorkspaceClient(), this.username);
      this.useWorkspace = resolution.useWorkspace;
      this.params = {
        ...resolution.params,
        collectionId: this.settings.lenv.usid,
        process: PROCESSING_RESULTS,
        stageOut: {
          ...resolution.params.stageOut,
          workspace: this.workspaceName,
          accessPoint,
        },
      };
    });
  }

  async postExecutionHook(
    _logPath: string,
    output: Record<string, unknown>,
    _usageReport: unknown,
    _toolLogs: string[],
  ): Promise<void> {
    await this.runHook('post-execution', async () => {
      log.info('post execution hook');
      const { StacCatalogUri: catalogUri } = postHookOutputSchema.parse(output);
      log.info({ catalogUri }, 'read catalog');

      const credentials = toStorageCredentials(this.params);
      const io = this.createStacIO(credentials, this.params.stageOut.accessPoint);
      const client = this.useWorkspace ? this.getWorkspaceClient() : undefined;

      try {
        const { featureCollection } = await publishResults({
          catalogUri,
          collectionId: this.params.collectionId,
          credentials,
          io,
          registration: client ? { client, username: this.username } : undefined,
        });
        this.featureCollection = featureCollection;
      } finally {
        io.destroy?.();
      }
    });
  }

  /** Publish links to the per-step tool logs in the host's `service_logs` section. */
  handleOutputs(_logPath: string, _output: Record<string, unknown>, _usageReport: unknown, toolLogs: string[]): void {
    log.info({ count: toolLogs.length }, 'handle outputs');
    const { tmpUrl } = this.settings.main;
    const { Identifier, usid } = this.settings.lenv;

    const serviceLogs: Record<string, unknown> = { ...this.conf.service_logs };
    toolLogs.forEach((toolLog, i) => {
      const name = basename(toolLog);
      const suffix = i > 0 ? `_${i}` : '';
      serviceLogs[`url${suffix}`] = joinUrl(tmpUrl, `${Identifier}-${usid}`, name);
      serviceLogs[`title${suffix}`] = `Tool log ${name}`;
      serviceLogs[`rel${suffix}`] = 'related';
    });
    serviceLogs.length = String(toolLogs.length);
    this.conf.service_logs = serviceLogs;
  }

  getPodEnvVars(): Record<string, string> {
    return this.settings.pod_env_vars;
  }

  getPodNodeSelector(): Record<string, string> {
    return this.settings.pod_node_selector;
  }

  /** Image pull secrets for the workflow pods; `{}` when the file is absent or unusable. */
  async getSecrets(): Promise<Record<string, unknown>> {
    const path = this.deps.secretsPath ?? DEFAULT_SECRETS_PATH;
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return {};
      throw err;
    }
    try {
      const parsed = z.record(z.unknown()).safeParse(parseYaml(text));
      return parsed.success ? parsed.data : {};
    } catch (err) {
      if (err instanceof YAMLParseError) {
        log.warn({ path, err }, 'invalid secrets file');
        return {};
      }
      throw err;
    }
  }

  getAdditionalParameters(): Record<string, unknown> {
    return { ...this.settings.additional_parameters, ...toAdditionalParameters(this.params) };
  }
}

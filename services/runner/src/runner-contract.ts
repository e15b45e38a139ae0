/**
 * Contracts between the execution hooks and the WPS host / workflow engine.
 *
 * The engine (CWL scheduling, pods, namespaces) and the host runtime are
 * external; these interfaces describe only what the hooks rely on.
 */
import { logger } from '@stageout/shared';

const log = logger.child({ module: 'host-runtime' });

/** The host's nested configuration mapping, mutated in place by the hooks. */
export type HostConf = Record<string, Record<string, unknown> | undefined>;

export interface HostValue {
  value?: unknown;
  [key: string]: unknown;
}

export type HostInputs = Record<string, HostValue>;
export type HostOutputs = Record<string, HostValue>;

/** Status constants and callbacks supplied by the WPS host. */
export interface HostRuntime {
  readonly SERVICE_SUCCEEDED: number;
  readonly SERVICE_FAILED: number;
  updateStatus(conf: HostConf, progress: number): void;
  translate(message: string): string;
}

/** Stand-in runtime for running outside the host. */
export const noopHostRuntime: HostRuntime = {
  SERVICE_SUCCEEDED: 3,
  SERVICE_FAILED: 4,
  updateStatus(_conf, progress) {
    log.info({ progress }, 'status update');
  },
  translate(message) {
    return message;
  },
};

/** Hooks invoked by the workflow engine around a run. */
export interface ExecutionHandler {
  preExecutionHook(): Promise<void>;
  postExecutionHook(
    logPath: string,
    output: Record<string, unknown>,
    usageReport: unknown,
    toolLogs: string[],
  ): Promise<void>;
  handleOutputs(logPath: string, output: Record<string, unknown>, usageReport: unknown, toolLogs: string[]): void;
  getPodEnvVars(): Record<string, string>;
  getPodNodeSelector(): Record<string, string>;
  getSecrets(): Promise<Record<string, unknown>>;
  getAdditionalParameters(): Record<string, unknown>;
}

export interface RunnerExecuteOptions {
  /** Cluster namespace the workflow pods run in. */
  namespace: string;
  /** Directory the engine writes its local outputs to. */
  workingDirectory: string;
}

export interface WorkflowRunner {
  getNamespaceName(): string;
  /** Runs the workflow to completion and returns a host status code. */
  execute(options: RunnerExecuteOptions): Promise<number>;
}

export interface WorkflowRunnerInit {
  cwl: Record<string, unknown>;
  conf: HostConf;
  inputs: HostInputs;
  outputs: HostOutputs;
  executionHandler: ExecutionHandler;
}

export type WorkflowRunnerFactory = (init: WorkflowRunnerInit) => WorkflowRunner;

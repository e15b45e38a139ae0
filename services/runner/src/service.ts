import { mkdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { logger } from '@stageout/shared';
import { StageOutExecutionHandler, type ExecutionHandlerDeps } from './handler.js';
import {
  noopHostRuntime,
  type HostConf,
  type HostInputs,
  type HostOutputs,
  type HostRuntime,
  type WorkflowRunnerFactory,
} from './runner-contract.js';
import { workspaceNamespace } from './workspace-config.js';

const log = logger.child({ module: 'service' });

export const DEFAULT_CWL_PATH = fileURLToPath(new URL('../app-package.cwl', import.meta.url));

const cwlDocumentSchema = z.record(z.unknown());

export interface ServiceOptions {
  createRunner: WorkflowRunnerFactory;
  runtime?: HostRuntime;
  cwlPath?: string;
  handlerDeps?: ExecutionHandlerDeps;
}

export async function loadCwl(path: string): Promise<Record<string, unknown>> {
  const parsed = cwlDocumentSchema.safeParse(parseYaml(await readFile(path, 'utf-8')));
  if (!parsed.success) {
    throw new Error(`${path} does not hold a CWL document`);
  }
  return parsed.data;
}

function setMessage(conf: HostConf, message: string): void {
  conf.lenv = { ...conf.lenv, message };
}

/**
 * Process entry point called by the WPS host: runs the packaged CWL
 * workflow with the stage-out hooks and hands the resulting collection back
 * as the first declared output.
 */
export async function runWorkflowService(
  conf: HostConf,
  inputs: HostInputs,
  outputs: HostOutputs,
  options: ServiceOptions,
): Promise<number> {
  const runtime = options.runtime ?? noopHostRuntime;
  try {
    const cwl = await loadCwl(options.cwlPath ?? DEFAULT_CWL_PATH);
    const executionHandler = new StageOutExecutionHandler(conf, inputs, options.handlerDeps);
    const runner = options.createRunner({ cwl, conf, inputs, outputs, executionHandler });

    const workingDirectory = join(executionHandler.settings.main.tmpPath, runner.getNamespaceName());
    await mkdir(workingDirectory, { recursive: true, mode: 0o777 });

    const exitStatus = await runner.execute({
      namespace: workspaceNamespace(executionHandler.workspaceName),
      workingDirectory,
    });

    if (exitStatus === runtime.SERVICE_SUCCEEDED) {
      const [outputName] = Object.keys(outputs);
      if (outputName === undefined) {
        throw new Error('the process declares no output');
      }
      log.info({ output: outputName }, 'setting collection into output');
      outputs[outputName] = { ...outputs[outputName], value: executionHandler.featureCollection };
      return runtime.SERVICE_SUCCEEDED;
    }

    setMessage(conf, runtime.translate('Execution failed'));
    return runtime.SERVICE_FAILED;
  } catch (err) {
    log.error({ err }, 'error in processing execution');
    const stack = err instanceof Error ? (err.stack ?? err.message) : String(err);
    setMessage(conf, runtime.translate(`Exception during execution...\n${stack}\n`));
    return runtime.SERVICE_FAILED;
  }
}

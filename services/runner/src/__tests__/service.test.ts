import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

vi.mock('@stageout/shared', () => ({
  logger: {
    child: () => ({
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    }),
  },
  withSpan: vi.fn(async (_name: string, _attrs: Record<string, unknown>, fn: (span: unknown) => Promise<unknown>) =>
    fn({}),
  ),
}));

import type { ExecutionHandlerDeps } from '../handler.js';
import {
  noopHostRuntime,
  type HostConf,
  type HostOutputs,
  type HostRuntime,
  type RunnerExecuteOptions,
  type WorkflowRunnerFactory,
  type WorkflowRunnerInit,
} from '../runner-contract.js';
import { DEFAULT_CWL_PATH, loadCwl, runWorkflowService } from '../service.js';
import { MemoryStacIO, catalogDoc, collectionDoc } from './memory-stac-io.js';

const CATALOG = 's3://eoepca/processing-results/run-77/catalog.json';

let tmpPath: string;

beforeEach(async () => {
  tmpPath = await mkdtemp(join(tmpdir(), 'zoo-tmp-'));
});

afterEach(async () => {
  await rm(tmpPath, { recursive: true, force: true });
});

function makeConf(): HostConf {
  return {
    main: { tmpUrl: 'https://wps.test/temp', tmpPath },
    lenv: { usid: 'run-77', Identifier: 'water-bodies' },
  };
}

function handlerDeps(): ExecutionHandlerDeps {
  const io = new MemoryStacIO({
    [CATALOG]: catalogDoc('run-77', [{ rel: 'child', href: './results/collection.json' }]),
    's3://eoepca/processing-results/run-77/results/collection.json': collectionDoc('results', []),
  });
  return {
    env: {},
    workspaceConfig: { getAccessPoint: vi.fn().mockResolvedValue(undefined) },
    createStacIO: () => io,
  };
}

interface FakeEngine {
  factory: WorkflowRunnerFactory;
  inits: WorkflowRunnerInit[];
  executions: RunnerExecuteOptions[];
}

/** Engine that runs both hooks around a no-op workflow and returns `status`. */
function fakeEngine(status: number): FakeEngine {
  const inits: WorkflowRunnerInit[] = [];
  const executions: RunnerExecuteOptions[] = [];
  return {
    inits,
    executions,
    factory: (init) => {
      inits.push(init);
      return {
        getNamespaceName: () => 'water-bodies-run-77',
        async execute(options) {
          executions.push(options);
          await init.executionHandler.preExecutionHook();
          await init.executionHandler.postExecutionHook('/tmp/app.log', { StacCatalogUri: CATALOG }, {}, []);
          return status;
        },
      };
    },
  };
}

describe('loadCwl', () => {
  it('loads the packaged workflow', async () => {
    const cwl = await loadCwl(DEFAULT_CWL_PATH);
    expect(cwl.cwlVersion).toBe('v1.0');
    expect(Array.isArray(cwl.$graph)).toBe(true);
  });

  it('rejects a file that is not a mapping', async () => {
    const path = join(tmpPath, 'list.cwl');
    await writeFile(path, '- one\n- two\n');
    await expect(loadCwl(path)).rejects.toThrow(`${path} does not hold a CWL document`);
  });
});

describe('runWorkflowService', () => {
  it('returns the consolidated collection as the first output', async () => {
    const engine = fakeEngine(noopHostRuntime.SERVICE_SUCCEEDED);
    const outputs: HostOutputs = { stac: { value: null, mimeType: 'application/json' }, logs: {} };

    const status = await runWorkflowService(makeConf(), { workspace: { value: 'bob' } }, outputs, {
      createRunner: engine.factory,
      handlerDeps: handlerDeps(),
    });

    expect(status).toBe(3);
    expect(outputs.stac.mimeType).toBe('application/json');
    expect(JSON.parse(String(outputs.stac.value))).toEqual({ ...collectionDoc('results', []), id: 'run-77' });
    expect(outputs.logs).toEqual({});
  });

  it('runs the engine in the workspace namespace inside a per-run directory', async () => {
    const engine = fakeEngine(noopHostRuntime.SERVICE_SUCCEEDED);

    await runWorkflowService(makeConf(), { workspace: { value: 'bob' } }, { stac: {} }, {
      createRunner: engine.factory,
      handlerDeps: handlerDeps(),
    });

    const workingDirectory = join(tmpPath, 'water-bodies-run-77');
    expect(engine.executions).toEqual([{ namespace: 'ws-bob', workingDirectory }]);
    expect((await stat(workingDirectory)).isDirectory()).toBe(true);
    expect(engine.inits[0].cwl.cwlVersion).toBe('v1.0');
  });

  it('uses the default workspace namespace without a workspace input', async () => {
    const engine = fakeEngine(noopHostRuntime.SERVICE_SUCCEEDED);

    await runWorkflowService(makeConf(), {}, { stac: {} }, {
      createRunner: engine.factory,
      handlerDeps: handlerDeps(),
    });

    expect(engine.executions[0].namespace).toBe('ws-default');
  });

  it('reports a failed execution through the host runtime', async () => {
    const engine = fakeEngine(noopHostRuntime.SERVICE_FAILED);
    const conf = makeConf();
    const runtime: HostRuntime = { ...noopHostRuntime, translate: (message) => `[t] ${message}` };

    const status = await runWorkflowService(conf, {}, { stac: {} }, {
      createRunner: engine.factory,
      handlerDeps: handlerDeps(),
      runtime,
    });

    expect(status).toBe(4);
    expect(conf.lenv?.message).toBe('[t] Execution failed');
  });

  it('maps exceptions to a failure status with the stack in the message', async () => {
    const conf = makeConf();
    const createRunner: WorkflowRunnerFactory = () => ({
      getNamespaceName: () => 'water-bodies-run-77',
      execute: async () => {
        throw new Error('pod evicted');
      },
    });

    const status = await runWorkflowService(conf, {}, { stac: {} }, { createRunner, handlerDeps: handlerDeps() });

    expect(status).toBe(4);
    expect(String(conf.lenv?.message)).toMatch(/^Exception during execution\.\.\.\nError: pod evicted\n/);
    expect(conf.lenv?.usid).toBe('run-77');
  });

  it('fails when the process declares no output', async () => {
    const engine = fakeEngine(noopHostRuntime.SERVICE_SUCCEEDED);
    const conf = makeConf();

    const status = await runWorkflowService(conf, {}, {}, {
      createRunner: engine.factory,
      handlerDeps: handlerDeps(),
    });

    expect(status).toBe(4);
    expect(String(conf.lenv?.message)).toContain('the process declares no output');
  });

  it('fails when the CWL file is missing', async () => {
    const engine = fakeEngine(noopHostRuntime.SERVICE_SUCCEEDED);

    const status = await runWorkflowService(makeConf(), {}, { stac: {} }, {
      createRunner: engine.factory,
      handlerDeps: handlerDeps(),
      cwlPath: join(tmpPath, 'missing.cwl'),
    });

    expect(status).toBe(4);
    expect(engine.inits).toHaveLength(0);
  });
});

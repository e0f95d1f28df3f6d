import { SimulatedHost } from '../../src/adapters/host/simulated-host';
import { DEFAULT_CONFIG } from '../../src/config';
import { resetLogging, setLogHandler } from '../../src/logger';
import { AppContext, createApp, createAppContext } from '../../src/server';
import { pick, request } from './request';

const SPEC = {
  specVersion: '1.0.0',
  name: 'worker',
  pathSeparator: ':',
  steps: [
    { id: 'env', kind: 'create-interpreter-env', params: { name: 'w', pythonVersion: '3.12' } },
    { id: 'celery', kind: 'install-package', params: { name: 'celery', version: '5.4.0', env: 'w' }, requires: ['env'] },
    { id: 'path', kind: 'mutate-path-variable', params: { variable: 'PATH', segment: '/envs/w/bin' }, requires: ['env'] },
  ],
};

describe('Run API', () => {
  let ctx: AppContext;
  let host: SimulatedHost;

  beforeEach(() => {
    setLogHandler(() => undefined);
    host = new SimulatedHost();
    ctx = createAppContext({ config: { ...DEFAULT_CONFIG, backoffBaseMs: 0 }, host });
  });

  afterEach(() => {
    resetLogging();
  });

  test('POST /api/runs provisions and records a run', async () => {
    const app = createApp(ctx);
    const res = await request(app, 'POST', '/api/runs', { spec: SPEC });

    expect(res.status).toBe(201);
    expect(pick(res.body, 'run.status')).toBe('succeeded');
    expect(pick(res.body, 'run.snapshot')).toEqual({
      revision: 3,
      resources: {
        'env:w:python-version': '3.12',
        'package:w/celery': '5.4.0',
        'envvar:PATH': '/envs/w/bin',
      },
    });

    const runId = pick(res.body, 'run.id');
    expect(typeof runId).toBe('string');
    const fetched = await request(app, 'GET', `/api/runs/${String(runId)}`);
    expect(fetched.status).toBe(200);
    expect(pick(fetched.body, 'run.results.2.status')).toBe('applied');
  });

  test('POST /api/runs skips steps satisfied by the given snapshot', async () => {
    const app = createApp(ctx);
    const res = await request(app, 'POST', '/api/runs', {
      spec: SPEC,
      snapshot: { revision: 7, resources: { 'env:w:python-version': '3.12' } },
    });

    expect(res.status).toBe(201);
    expect(pick(res.body, 'run.results.0.status')).toBe('skipped');
    expect(pick(res.body, 'run.snapshot.revision')).toBe(9);
    expect(host.callCount('createInterpreterEnv')).toBe(0);
  });

  test('POST /api/runs with dryRun previews without running', async () => {
    const app = createApp(ctx);
    const res = await request(app, 'POST', '/api/runs', { spec: SPEC, options: { dryRun: true } });

    expect(res.status).toBe(200);
    expect(pick(res.body, 'preview.0')).toEqual({
      stepId: 'env',
      action: 'apply',
      postcondition: 'env:w:python-version == 3.12',
    });
    expect(host.calls).toHaveLength(0);

    const list = await request(app, 'GET', '/api/runs');
    expect(pick(list.body, 'total')).toBe(0);
  });

  test('POST /api/runs records a failed run', async () => {
    host.misreport('w/celery', '5.3.0');
    const app = createApp(ctx);
    const res = await request(app, 'POST', '/api/runs', { spec: SPEC });

    expect(res.status).toBe(201);
    expect(pick(res.body, 'run.status')).toBe('failed');
    expect(pick(res.body, 'run.error.code')).toBe('STEP.POSTCONDITION_NOT_MET');
    expect(pick(res.body, 'run.error.stepId')).toBe('celery');
  });

  test('POST /api/runs validates options', async () => {
    const app = createApp(ctx);
    const res = await request(app, 'POST', '/api/runs', { spec: SPEC, options: { parallel: 0 } });

    expect(res.status).toBe(422);
    expect(pick(res.body, 'error.message')).toBe('options.parallel must be an integer >= 1');
  });

  test('POST /api/runs validates the snapshot', async () => {
    const app = createApp(ctx);
    const res = await request(app, 'POST', '/api/runs', { spec: SPEC, snapshot: { revision: 1, resources: { a: 1 } } });

    expect(res.status).toBe(422);
    expect(pick(res.body, 'error.message')).toBe('snapshot resource "a" must be a string');
  });

  test('GET /api/runs lists the most recent runs first', async () => {
    const app = createApp(ctx);
    await request(app, 'POST', '/api/runs', { spec: SPEC });
    await request(app, 'POST', '/api/runs', { spec: { ...SPEC, name: 'worker-2' } });

    const res = await request(app, 'GET', '/api/runs?limit=1');
    expect(res.status).toBe(200);
    expect(pick(res.body, 'total')).toBe(2);
    expect(pick(res.body, 'hasMore')).toBe(true);
    expect(pick(res.body, 'items.0.specName')).toBe('worker-2');
  });

  test('GET /api/runs/:runId returns 404 for unknown runs', async () => {
    const res = await request(createApp(ctx), 'GET', '/api/runs/run_missing');
    expect(res.status).toBe(404);
    expect(pick(res.body, 'error.code')).toBe('VALIDATION.NOT_FOUND');
  });

  test('POST /api/runs/:runId/verify reports drift-free state', async () => {
    const app = createApp(ctx);
    const created = await request(app, 'POST', '/api/runs', { spec: SPEC });
    const res = await request(app, 'POST', `/api/runs/${String(pick(created.body, 'run.id'))}/verify`);

    expect(res.status).toBe(200);
    expect(pick(res.body, 'report.passed')).toBe(true);
    expect(pick(res.body, 'report.revision')).toBe(3);
  });
});

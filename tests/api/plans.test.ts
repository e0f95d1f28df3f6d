import { SimulatedHost } from '../../src/adapters/host/simulated-host';
import { DEFAULT_CONFIG } from '../../src/config';
import { resetLogging, setLogHandler } from '../../src/logger';
import { createApp, createAppContext } from '../../src/server';
import { pick, request } from './request';

const SPEC = {
  specVersion: '1.0.0',
  name: 'api-host',
  steps: [
    { id: 'env', kind: 'create-interpreter-env', params: { name: 'svc', pythonVersion: '3.12' } },
    { id: 'uvicorn', kind: 'install-package', params: { name: 'uvicorn', env: 'svc' }, requires: ['env'] },
  ],
};

describe('Plan API', () => {
  const app = createApp(createAppContext({ config: DEFAULT_CONFIG, host: new SimulatedHost() }));

  beforeEach(() => {
    setLogHandler(() => undefined);
  });

  afterEach(() => {
    resetLogging();
  });

  test('GET /health reports the engine and host', async () => {
    const res = await request(app, 'GET', '/health');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', version: '0.1.0', specVersion: '1.0.0', host: 'simulated' });
  });

  test('POST /api/plans compiles a document', async () => {
    const res = await request(app, 'POST', '/api/plans', { spec: SPEC });
    expect(res.status).toBe(200);
    expect(pick(res.body, 'plan.order')).toEqual(['env', 'uvicorn']);
    expect(pick(res.body, 'plan.specName')).toBe('api-host');
    expect(pick(res.body, 'warnings')).toEqual([]);
  });

  test('POST /api/plans accepts YAML text and returns its warnings', async () => {
    const yaml = [
      'specVersion: "1.0.0"',
      'name: yaml-host',
      'steps:',
      '  - id: jq',
      '    kind: install-package',
      '    owner: ops',
      '    params: { name: jq }',
    ].join('\n');
    const res = await request(app, 'POST', '/api/plans', { spec: yaml });

    expect(res.status).toBe(200);
    expect(pick(res.body, 'plan.order')).toEqual(['jq']);
    expect(pick(res.body, 'warnings')).toEqual(['Step "jq": unknown field "owner" is ignored']);
  });

  test('POST /api/plans rejects YAML syntax errors', async () => {
    const res = await request(app, 'POST', '/api/plans', { spec: 'steps: [unclosed' });
    expect(res.status).toBe(422);
    expect(pick(res.body, 'error.code')).toBe('VALIDATION.SYNTAX');
  });

  test('POST /api/plans requires a spec', async () => {
    const res = await request(app, 'POST', '/api/plans', {});
    expect(res.status).toBe(400);
    expect(pick(res.body, 'error.code')).toBe('VALIDATION.SCHEMA');
    expect(pick(res.body, 'error.message')).toBe('Missing required field(s): spec');
  });

  test('POST /api/plans reports a cycle', async () => {
    const res = await request(app, 'POST', '/api/plans', {
      spec: {
        ...SPEC,
        steps: [
          { id: 'a', kind: 'install-package', params: { name: 'a' }, requires: ['b'] },
          { id: 'b', kind: 'install-package', params: { name: 'b' }, requires: ['a'] },
        ],
      },
    });
    expect(res.status).toBe(422);
    expect(pick(res.body, 'error.code')).toBe('GRAPH.CYCLE');
    expect(pick(res.body, 'error.details.cycle')).toEqual(['a', 'b', 'a']);
  });

  test('POST /api/plans collects schema errors', async () => {
    const res = await request(app, 'POST', '/api/plans', { spec: { name: 'x' } });
    expect(res.status).toBe(422);
    expect(pick(res.body, 'error.code')).toBe('VALIDATION.SPEC');
    expect(pick(res.body, 'error.details.errors.1.message')).toBe('Missing required field: steps');
  });

  test('malformed JSON bodies are rejected', async () => {
    const res = await request(app, 'POST', '/api/plans', undefined, '{"spec":');
    expect(res.status).toBe(400);
    expect(pick(res.body, 'error.message')).toBe('Request body is not valid JSON');
  });
});

/**
 * Records are copied on the way in and out, so mutating a returned run must
 * never change what the store holds.
 */

import { ProvisioningRun, RunStatus, StepResultStatus } from '../../src/domain/run';
import { ActionKind } from '../../src/domain/step';
import { createMemoryStore } from '../../src/storage/memory-store';

function makeRun(id: string, startedAt: string): ProvisioningRun {
  return {
    id,
    specName: 'dev-box',
    spec: {
      specVersion: '1.0.0',
      name: 'dev-box',
      steps: [{ id: 'jq', kind: ActionKind.InstallPackage, params: { name: 'jq' }, requires: [] }],
    },
    status: RunStatus.Running,
    planHash: 'hash',
    executionOrder: ['jq'],
    results: [],
    snapshot: { revision: 0, resources: {} },
    startedAt,
  };
}

describe('MemoryRunStore', () => {
  test('returned runs are isolated from the store', async () => {
    const store = createMemoryStore();
    await store.runs.create(makeRun('run_1', '2026-01-01T00:00:00.000Z'));

    const fetched = await store.runs.getById('run_1');
    if (!fetched) throw new Error('run not stored');
    fetched.executionOrder.push('MUTATED');
    fetched.snapshot.resources['package:jq'] = '1.7';
    fetched.spec.steps[0].params.name = 'MUTATED';

    const fresh = await store.runs.getById('run_1');
    expect(fresh?.executionOrder).toEqual(['jq']);
    expect(fresh?.snapshot.resources).toEqual({});
    expect(fresh?.spec.steps[0].params.name).toBe('jq');
  });

  test('the object passed to create is not retained', async () => {
    const store = createMemoryStore();
    const run = makeRun('run_1', '2026-01-01T00:00:00.000Z');
    await store.runs.create(run);
    run.executionOrder.push('MUTATED');

    expect((await store.runs.getById('run_1'))?.executionOrder).toEqual(['jq']);
  });

  test('update merges fields and keeps the id', async () => {
    const store = createMemoryStore();
    await store.runs.create(makeRun('run_1', '2026-01-01T00:00:00.000Z'));
    const updated = await store.runs.update('run_1', {
      id: 'run_other',
      status: RunStatus.Succeeded,
      results: [
        {
          stepId: 'jq',
          status: StepResultStatus.Applied,
          attempts: 1,
          startedAt: '2026-01-01T00:00:00.000Z',
          completedAt: '2026-01-01T00:00:02.000Z',
          durationMs: 2000,
          revision: 1,
        },
      ],
    });

    expect(updated?.id).toBe('run_1');
    expect(updated?.status).toBe(RunStatus.Succeeded);
    expect(updated?.results).toHaveLength(1);
    expect(await store.runs.getById('run_other')).toBeNull();
  });

  test('update of an unknown run resolves null', async () => {
    const store = createMemoryStore();
    expect(await store.runs.update('run_missing', { status: RunStatus.Failed })).toBeNull();
  });

  test('list returns the most recent runs first', async () => {
    const store = createMemoryStore();
    await store.runs.create(makeRun('run_old', '2026-01-01T00:00:00.000Z'));
    await store.runs.create(makeRun('run_new', '2026-03-01T00:00:00.000Z'));
    await store.runs.create(makeRun('run_mid', '2026-02-01T00:00:00.000Z'));

    const page = await store.runs.list({ limit: 2, offset: 1 });
    expect(page.items.map((r) => r.id)).toEqual(['run_mid', 'run_old']);
    expect(page).toMatchObject({ total: 3, limit: 2, offset: 1, hasMore: false });
  });
});

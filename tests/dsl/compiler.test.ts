import { buildPlan, compileSpec, transitivePrerequisites } from '../../src/dsl/compiler';
import { CycleError, DuplicateStepError, UnknownPrerequisiteError } from '../../src/domain/errors';
import { ActionKind, Step } from '../../src/domain/step';

function step(id: string, requires: string[] = []): Step {
  return { id, kind: ActionKind.InstallPackage, params: { name: id }, requires };
}

/** Deterministic PRNG (mulberry32) so generated graphs are reproducible. */
function seededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * An acyclic step set: step `n<i>` may only require `n<j>` with j < i, and the
 * declaration order is shuffled so it rarely matches a valid order.
 */
function randomDag(random: () => number): Step[] {
  const size = 2 + Math.floor(random() * 19);
  const steps: Step[] = [];
  for (let i = 0; i < size; i++) {
    const requires: string[] = [];
    for (let j = 0; j < i; j++) {
      if (random() < 0.3) requires.push(`n${j}`);
    }
    steps.push(step(`n${i}`, requires));
  }
  for (let i = steps.length - 1; i > 0; i--) {
    const k = Math.floor(random() * (i + 1));
    [steps[i], steps[k]] = [steps[k], steps[i]];
  }
  return steps;
}

describe('Plan Compiler', () => {
  test('orders prerequisites before dependents', () => {
    const plan = buildPlan([step('app', ['lib']), step('lib', ['base']), step('base')]);
    expect(plan.order).toEqual(['base', 'lib', 'app']);
  });

  test('breaks ties by declaration order', () => {
    const plan = buildPlan([step('c'), step('a'), step('b', ['c']), step('d')]);
    expect(plan.order).toEqual(['c', 'a', 'b', 'd']);
  });

  test('a dependent released late still yields to earlier declarations', () => {
    const plan = buildPlan([step('x', ['z']), step('y'), step('z')]);
    expect(plan.order).toEqual(['y', 'z', 'x']);
  });

  test('produces the same order and hash on every compile', () => {
    const steps = [step('a'), step('b', ['a']), step('c', ['a']), step('d', ['b', 'c'])];
    const first = buildPlan(steps, { specName: 'diamond' });
    const second = buildPlan(steps, { specName: 'diamond' });
    expect(first.order).toEqual(['a', 'b', 'c', 'd']);
    expect(second.order).toEqual(first.order);
    expect(second.planHash).toBe(first.planHash);
    expect(first.planHash).toMatch(/^[a-f0-9]{64}$/);
  });

  test('records declaration positions', () => {
    const plan = buildPlan([step('b', ['a']), step('a')]);
    expect(plan.declarationIndex).toEqual({ b: 0, a: 1 });
  });

  test('detects a two-step cycle and reports its path', () => {
    let thrown: unknown;
    try {
      buildPlan([step('A', ['B']), step('B', ['A'])]);
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(CycleError);
    if (!(thrown instanceof CycleError)) return;
    expect(thrown.cycle).toEqual(['A', 'B', 'A']);
    expect(thrown.message).toBe('Prerequisite cycle detected: A → B → A');
    expect(thrown.code).toBe('GRAPH.CYCLE');
  });

  test('detects a self-dependency', () => {
    expect(() => buildPlan([step('loop', ['loop'])])).toThrow(CycleError);
  });

  test('rejects an unknown prerequisite', () => {
    expect(() => buildPlan([step('a', ['ghost'])])).toThrow(UnknownPrerequisiteError);
    expect(() => buildPlan([step('a', ['ghost'])])).toThrow('Step "a" requires unknown step "ghost"');
  });

  test('rejects duplicate step ids', () => {
    expect(() => buildPlan([step('a'), step('b'), step('a')])).toThrow(DuplicateStepError);
  });

  test('every generated acyclic step set is ordered after its prerequisites', () => {
    const random = seededRandom(20260101);
    for (let round = 0; round < 200; round++) {
      const steps = randomDag(random);
      const plan = buildPlan(steps);

      expect([...plan.order].sort()).toEqual(steps.map((s) => s.id).sort());
      const position = new Map(plan.order.map((id, i) => [id, i]));
      for (const s of steps) {
        for (const dep of s.requires) {
          expect(position.get(dep)).toBeLessThan(position.get(s.id) ?? -1);
        }
      }

      // Each position holds the earliest-declared step whose prerequisites are done.
      const done = new Set<string>();
      for (const id of plan.order) {
        const ready = steps.find((s) => !done.has(s.id) && s.requires.every((dep) => done.has(dep)));
        expect(ready?.id).toBe(id);
        done.add(id);
      }
    }
  });

  test('computes transitive prerequisites', () => {
    const plan = buildPlan([step('a'), step('b', ['a']), step('c', ['b']), step('d')]);
    const closure = transitivePrerequisites(plan);
    expect([...(closure.get('c') ?? [])].sort()).toEqual(['a', 'b']);
    expect(closure.get('d')?.size).toBe(0);
  });

  describe('compileSpec', () => {
    test('compiles a valid document', () => {
      const result = compileSpec({
        specVersion: '1.0.0',
        name: 'workstation',
        pathSeparator: ';',
        steps: [
          { id: 'env', kind: 'create-interpreter-env', params: { name: 'ml', pythonVersion: '3.11' } },
          { id: 'torch', kind: 'install-package', params: { name: 'torch', env: 'ml' }, requires: ['env'] },
        ],
      });
      expect(result.success).toBe(true);
      expect(result.plan?.specName).toBe('workstation');
      expect(result.plan?.pathSeparator).toBe(';');
      expect(result.plan?.order).toEqual(['env', 'torch']);
    });

    test('returns graph errors instead of throwing', () => {
      const result = compileSpec({
        specVersion: '1.0.0',
        name: 'broken',
        steps: [
          { id: 'a', kind: 'install-package', params: { name: 'a' }, requires: ['b'] },
          { id: 'b', kind: 'install-package', params: { name: 'b' }, requires: ['a'] },
        ],
      });
      expect(result.success).toBe(false);
      expect(result.plan).toBeUndefined();
      expect(result.errors.map((e) => e.code)).toEqual(['GRAPH.CYCLE']);
    });

    test('returns validation errors before graph checks', () => {
      const result = compileSpec({ specVersion: '1.0.0', name: 'x', steps: 'nope' });
      expect(result.success).toBe(false);
      expect(result.errors[0].code).toBe('VALIDATION.INVALID_STEPS');
    });
  });
});

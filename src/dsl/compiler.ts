/**
 * Plan compiler.
 *
 * Builds the dependency graph of a provisioning specification and compiles it
 * into an execution plan: a deterministic topological order in which, among
 * steps whose prerequisites are satisfied, the earliest declared runs first.
 */

import { createHash } from 'crypto';
import path from 'path';
import {
  CycleError,
  DuplicateStepError,
  StrataError,
  TypedError,
  UnknownPrerequisiteError,
  toTypedError,
} from '../domain/errors';
import { ProvisioningSpec, Step } from '../domain/step';
import { ValidationResult, validateSpec } from './validator';

/** The compiled execution plan. */
export interface ExecutionPlan {
  specName: string;
  /** Topologically sorted step ids. */
  order: string[];
  /** Step definitions indexed by id. */
  steps: Record<string, Step>;
  /** Position of each step in the source document. */
  declarationIndex: Record<string, number>;
  /** Separator used when composing path-list variables. */
  pathSeparator: string;
  /** SHA-256 of the order and step definitions. */
  planHash: string;
  compiledAt: string;
}

/** Compilation result. */
export interface CompilationResult {
  success: boolean;
  plan?: ExecutionPlan;
  spec?: ProvisioningSpec;
  errors: TypedError[];
  validation: ValidationResult;
}

/**
 * Order steps by their prerequisites.
 *
 * @throws DuplicateStepError, UnknownPrerequisiteError or CycleError. Nothing
 * is executed before these checks pass.
 */
export function buildPlan(steps: Step[], options: { specName?: string; pathSeparator?: string } = {}): ExecutionPlan {
  const index = indexSteps(steps);

  for (const step of steps) {
    for (const dep of step.requires) {
      if (!index.has(dep)) {
        throw new UnknownPrerequisiteError(step.id, dep);
      }
    }
  }

  const cycle = findCycle(steps, index);
  if (cycle) {
    throw new CycleError(cycle);
  }

  const order = topologicalOrder(steps, index);
  const stepMap: Record<string, Step> = {};
  const declarationIndex: Record<string, number> = {};
  for (const [id, position] of index) {
    stepMap[id] = steps[position];
    declarationIndex[id] = position;
  }

  return {
    specName: options.specName ?? 'unnamed',
    order,
    steps: stepMap,
    declarationIndex,
    pathSeparator: options.pathSeparator ?? path.delimiter,
    planHash: computeHash(JSON.stringify({ order, steps: order.map((id) => stepMap[id]) })),
    compiledAt: new Date().toISOString(),
  };
}

/** Validate a specification document and compile it into a plan. */
export function compileSpec(document: unknown): CompilationResult {
  const validation = validateSpec(document);
  if (!validation.valid || !validation.spec) {
    return { success: false, errors: validation.errors, validation };
  }
  return compileValidated(validation.spec, validation);
}

/** Compile an already validated specification. */
export function compileValidated(spec: ProvisioningSpec, validation?: ValidationResult): CompilationResult {
  const effectiveValidation = validation ?? { valid: true, errors: [], warnings: [], spec };
  try {
    const plan = buildPlan(spec.steps, { specName: spec.name, pathSeparator: spec.pathSeparator });
    return { success: true, plan, spec, errors: [], validation: effectiveValidation };
  } catch (err) {
    if (err instanceof StrataError) {
      return { success: false, spec, errors: [err.typedError], validation: effectiveValidation };
    }
    return { success: false, spec, errors: [toTypedError(err)], validation: effectiveValidation };
  }
}

/**
 * Transitive prerequisites of every step. Two steps are unordered when
 * neither appears in the other's set.
 */
export function transitivePrerequisites(plan: ExecutionPlan): Map<string, Set<string>> {
  const result = new Map<string, Set<string>>();
  for (const id of plan.order) {
    const closure = new Set<string>();
    for (const dep of plan.steps[id].requires) {
      closure.add(dep);
      for (const inherited of result.get(dep) ?? []) closure.add(inherited);
    }
    result.set(id, closure);
  }
  return result;
}

function indexSteps(steps: Step[]): Map<string, number> {
  const index = new Map<string, number>();
  steps.forEach((step, position) => {
    const first = index.get(step.id);
    if (first !== undefined) {
      throw new DuplicateStepError(step.id, [first, position]);
    }
    index.set(step.id, position);
  });
  return index;
}

/**
 * Depth-first search over "requires" edges with a recursion stack. Returns
 * the cycle as a path that starts and ends with the same id, or null.
 */
function findCycle(steps: Step[], index: Map<string, number>): string[] | null {
  const visited = new Set<string>();
  const inStack = new Set<string>();
  const stack: string[] = [];

  function visit(id: string): string[] | null {
    if (inStack.has(id)) {
      return [...stack.slice(stack.indexOf(id)), id];
    }
    if (visited.has(id)) return null;

    visited.add(id);
    inStack.add(id);
    stack.push(id);

    const position = index.get(id);
    const requires = position === undefined ? [] : steps[position].requires;
    for (const dep of requires) {
      const cycle = visit(dep);
      if (cycle) return cycle;
    }

    stack.pop();
    inStack.delete(id);
    return null;
  }

  for (const step of steps) {
    const cycle = visit(step.id);
    if (cycle) return cycle;
  }
  return null;
}

/** Kahn's algorithm; the ready set is drained lowest declaration index first. */
function topologicalOrder(steps: Step[], index: Map<string, number>): string[] {
  const remaining = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const step of steps) {
    remaining.set(step.id, new Set(step.requires).size);
    dependents.set(step.id, []);
  }
  for (const step of steps) {
    for (const dep of new Set(step.requires)) {
      dependents.get(dep)?.push(step.id);
    }
  }

  const ready: number[] = [];
  for (const step of steps) {
    if (remaining.get(step.id) === 0) ready.push(index.get(step.id) ?? 0);
  }

  const order: string[] = [];
  while (ready.length > 0) {
    ready.sort((a, b) => a - b);
    const position = ready.shift();
    if (position === undefined) break;
    const id = steps[position].id;
    order.push(id);

    for (const next of dependents.get(id) ?? []) {
      const left = (remaining.get(next) ?? 0) - 1;
      remaining.set(next, left);
      if (left === 0) ready.push(index.get(next) ?? 0);
    }
  }

  return order;
}

/** Compute the SHA-256 hex digest of a string. */
export function computeHash(data: string): string {
  return createHash('sha256').update(data).digest('hex');
}

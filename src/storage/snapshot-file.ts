/**
 * Snapshot file persistence.
 *
 * A provisioning run persists its snapshot together with its execution log so
 * a later invocation can skip satisfied steps and the verifier can tell drift
 * from steps that were never attempted. The file carries a schema version;
 * any other version is rejected instead of being read as if it were current.
 */

import { randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { SnapshotSchemaError, StrataError, SuggestedFix, TypedError, createTypedError } from '../domain/errors';
import { StepResult, StepResultStatus } from '../domain/run';
import { Snapshot, SnapshotState } from '../domain/snapshot';
import { isRecord } from '../dsl/validator';

export const SNAPSHOT_SCHEMA_VERSION = 2;

export interface SnapshotFile {
  schemaVersion: typeof SNAPSHOT_SCHEMA_VERSION;
  specName: string;
  savedAt: string;
  snapshot: SnapshotState;
  /** Latest result of each step across the runs that produced the snapshot. */
  log: StepResult[];
}

/** Default snapshot location for a specification file. */
export function defaultSnapshotPath(specPath: string): string {
  return `${specPath}.snapshot.json`;
}

/** Write a snapshot file atomically (temp file + rename). */
export async function saveSnapshotFile(
  filePath: string,
  contents: { specName: string; snapshot: Snapshot | SnapshotState; log: StepResult[] },
): Promise<SnapshotFile> {
  const file: SnapshotFile = {
    schemaVersion: SNAPSHOT_SCHEMA_VERSION,
    specName: contents.specName,
    savedAt: new Date().toISOString(),
    snapshot: contents.snapshot instanceof Snapshot ? contents.snapshot.toJSON() : contents.snapshot,
    log: contents.log,
  };
  await writeAtomic(filePath, `${JSON.stringify(file, null, 2)}\n`);
  return file;
}

/**
 * Read a snapshot file. Resolves null when the file does not exist.
 *
 * @throws SnapshotSchemaError for any schema version but the current one
 */
export async function loadSnapshotFile(filePath: string): Promise<SnapshotFile | null> {
  const text = await readIfExists(filePath);
  return text === null ? null : parseSnapshotFile(text, filePath);
}

/** Parse and validate snapshot file contents. */
export function parseSnapshotFile(text: string, filePath: string): SnapshotFile {
  const document = parseJson(text, filePath);
  const version = document.schemaVersion;
  if (version !== SNAPSHOT_SCHEMA_VERSION) {
    throw new SnapshotSchemaError(filePath, version, SNAPSHOT_SCHEMA_VERSION);
  }
  return {
    schemaVersion: SNAPSHOT_SCHEMA_VERSION,
    specName: typeof document.specName === 'string' ? document.specName : 'unnamed',
    savedAt: typeof document.savedAt === 'string' ? document.savedAt : new Date(0).toISOString(),
    snapshot: readSnapshotState(document.snapshot, filePath),
    log: readLog(document.log, filePath),
  };
}

/**
 * Upgrade a schema 1 document (`{ schemaVersion: 1, revision, resources }`,
 * no execution log) to the current schema.
 */
export function migrateSnapshotDocument(text: string, filePath: string): SnapshotFile {
  const document = parseJson(text, filePath);
  if (document.schemaVersion === SNAPSHOT_SCHEMA_VERSION) {
    return parseSnapshotFile(text, filePath);
  }
  if (document.schemaVersion !== 1) {
    throw new SnapshotSchemaError(filePath, document.schemaVersion, SNAPSHOT_SCHEMA_VERSION);
  }
  return {
    schemaVersion: SNAPSHOT_SCHEMA_VERSION,
    specName: typeof document.specName === 'string' ? document.specName : 'unnamed',
    savedAt: new Date().toISOString(),
    snapshot: readSnapshotState({ revision: document.revision, resources: document.resources }, filePath),
    log: [],
  };
}

/** Rewrite a snapshot file in the current schema. Resolves with the version found. */
export async function migrateSnapshotFile(filePath: string): Promise<{ from: number; to: number }> {
  const text = await readIfExists(filePath);
  if (text === null) {
    throw malformed(filePath, 'file does not exist');
  }
  const found = parseJson(text, filePath).schemaVersion;
  const migrated = migrateSnapshotDocument(text, filePath);
  await writeAtomic(filePath, `${JSON.stringify(migrated, null, 2)}\n`);
  return { from: typeof found === 'number' ? found : SNAPSHOT_SCHEMA_VERSION, to: SNAPSHOT_SCHEMA_VERSION };
}

async function writeAtomic(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  const tempPath = `${filePath}.${randomUUID()}.tmp`;
  try {
    await fs.writeFile(tempPath, contents, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isRecord(err) && err.code === 'ENOENT') return null;
    throw err;
  }
}

function parseJson(text: string, filePath: string): Record<string, unknown> {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw malformed(filePath, err instanceof Error ? err.message : String(err));
  }
  if (!isRecord(document)) {
    throw malformed(filePath, 'expected a JSON object');
  }
  return document;
}

function readSnapshotState(value: unknown, filePath: string): SnapshotState {
  if (!isRecord(value) || !Number.isInteger(value.revision) || !isRecord(value.resources)) {
    throw malformed(filePath, 'snapshot must have an integer revision and a resources object');
  }
  const resources: Record<string, string> = {};
  for (const [key, resource] of Object.entries(value.resources)) {
    if (typeof resource !== 'string') {
      throw malformed(filePath, `resource "${key}" must be a string`);
    }
    resources[key] = resource;
  }
  return { revision: Number(value.revision), resources };
}

const RESULT_STATUSES: readonly string[] = Object.values(StepResultStatus);

function readLog(value: unknown, filePath: string): StepResult[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw malformed(filePath, 'log must be an array');
  }
  return value.map((entry, i) => {
    if (!isRecord(entry) || typeof entry.stepId !== 'string' || typeof entry.status !== 'string') {
      throw malformed(filePath, `log entry ${i} must have a stepId and a status`);
    }
    const status = Object.values(StepResultStatus).find((s) => s === entry.status);
    if (!status) {
      throw malformed(filePath, `log entry ${i} has unknown status "${entry.status}"; expected ${RESULT_STATUSES.join(', ')}`);
    }
    return {
      stepId: entry.stepId,
      status,
      attempts: typeof entry.attempts === 'number' ? entry.attempts : 0,
      startedAt: typeof entry.startedAt === 'string' ? entry.startedAt : '',
      completedAt: typeof entry.completedAt === 'string' ? entry.completedAt : '',
      durationMs: typeof entry.durationMs === 'number' ? entry.durationMs : 0,
      ...(typeof entry.revision === 'number' ? { revision: entry.revision } : {}),
      ...(isRecord(entry.error) ? { error: readTypedError(entry.error) } : {}),
    };
  });
}

function readTypedError(value: Record<string, unknown>): TypedError {
  const fixes: SuggestedFix[] = Array.isArray(value.suggestedFixes)
    ? value.suggestedFixes.filter(isRecord).map((fix) => ({
        type: String(fix.type),
        params: isRecord(fix.params) ? fix.params : {},
        ...(typeof fix.description === 'string' ? { description: fix.description } : {}),
      }))
    : [];
  return createTypedError({
    code: typeof value.code === 'string' ? value.code : 'SYSTEM.INTERNAL',
    message: typeof value.message === 'string' ? value.message : '',
    stepId: typeof value.stepId === 'string' ? value.stepId : undefined,
    retryable: value.retryable === true,
    details: isRecord(value.details) ? value.details : undefined,
    suggestedFixes: fixes,
  });
}

function malformed(filePath: string, reason: string): StrataError {
  return new StrataError(
    createTypedError({
      code: 'SNAPSHOT.MALFORMED',
      message: `Snapshot ${filePath} is malformed: ${reason}`,
      details: { filePath, reason },
    }),
  );
}

/**
 * Fold a run's results into the persisted log, keeping the latest result of
 * each step in first-seen order.
 */
export function mergeLogs(previous: StepResult[], latest: StepResult[]): StepResult[] {
  const byStep = new Map<string, StepResult>();
  for (const result of [...previous, ...latest]) {
    byStep.set(result.stepId, result);
  }
  return [...byStep.values()];
}

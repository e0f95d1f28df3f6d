/**
 * Run API routes.
 *
 * POST /runs: Provision a specification (or preview it with options.dryRun)
 * GET /runs: List recorded runs
 * GET /runs/:runId: Get a run with its execution log and snapshot
 * POST /runs/:runId/verify: Verify a run's postconditions against its snapshot
 */

import { Router } from 'express';
import { validationError, StrataError } from '../domain/errors';
import { SnapshotState } from '../domain/snapshot';
import { isRecord } from '../dsl/validator';
import { ProvisionOptions, ProvisioningService } from '../engine/provisioner';
import { bodyField, requireBodyFields } from './middleware';
import { specFromBody } from './plans';

interface RunRequestOptions extends Pick<ProvisionOptions, 'retries' | 'parallel'> {
  dryRun: boolean;
}

function parseRunOptions(value: unknown): RunRequestOptions {
  if (value === undefined) return { dryRun: false };
  if (!isRecord(value)) {
    throw new StrataError(validationError('options must be an object'));
  }
  const integer = (name: 'retries' | 'parallel', min: number): number | undefined => {
    const raw = value[name];
    if (raw === undefined) return undefined;
    if (typeof raw !== 'number' || !Number.isInteger(raw) || raw < min) {
      throw new StrataError(validationError(`options.${name} must be an integer >= ${min}`, { field: name }));
    }
    return raw;
  };
  return {
    dryRun: value.dryRun === true,
    retries: integer('retries', 0),
    parallel: integer('parallel', 1),
  };
}

function parseSnapshot(value: unknown): SnapshotState | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value) || typeof value.revision !== 'number' || !isRecord(value.resources)) {
    throw new StrataError(validationError('snapshot must be { revision, resources }'));
  }
  const resources: Record<string, string> = {};
  for (const [key, resource] of Object.entries(value.resources)) {
    if (typeof resource !== 'string') {
      throw new StrataError(validationError(`snapshot resource "${key}" must be a string`, { key }));
    }
    resources[key] = resource;
  }
  return { revision: value.revision, resources };
}

function parseListNumber(value: unknown): number | undefined {
  if (typeof value !== 'string' || value === '') return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
}

export function createRunRoutes(service: ProvisioningService): Router {
  const router = Router();

  /**
   * POST /runs
   * Runs synchronously; responds once the run has ended.
   */
  router.post('/runs', requireBodyFields('spec'), async (req, res, next) => {
    try {
      const spec = specFromBody(bodyField(req, 'spec'));
      const snapshot = parseSnapshot(bodyField(req, 'snapshot'));
      const { dryRun, ...options } = parseRunOptions(bodyField(req, 'options'));

      if (dryRun) {
        res.json({ preview: service.preview(spec, snapshot) });
        return;
      }

      const run = await service.provision(spec, { ...options, snapshot });
      res.status(201).json({ run });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /runs
   * Most recent first.
   */
  router.get('/runs', async (req, res, next) => {
    try {
      const result = await service.listRuns({
        limit: parseListNumber(req.query.limit),
        offset: parseListNumber(req.query.offset),
      });
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  router.get('/runs/:runId', async (req, res, next) => {
    try {
      const run = await service.getRun(req.params.runId);
      res.json({ run });
    } catch (err) {
      next(err);
    }
  });

  router.post('/runs/:runId/verify', async (req, res, next) => {
    try {
      const report = await service.verifyRun(req.params.runId);
      res.json({ report });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

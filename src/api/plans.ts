/**
 * Plan API routes.
 *
 * POST /plans: Compile a specification into an execution plan
 */

import { Router } from 'express';
import { parseDocument } from '../dsl/parser';
import { ProvisioningService } from '../engine/provisioner';
import { bodyField, requireBodyFields } from './middleware';

/**
 * A specification in a request body: a parsed document, or YAML/JSON text
 * (JSON parses as YAML).
 */
export function specFromBody(value: unknown): unknown {
  return typeof value === 'string' ? parseDocument(value) : value;
}

export function createPlanRoutes(service: ProvisioningService): Router {
  const router = Router();

  /**
   * POST /plans
   * Validate and compile. 422 with the first error for malformed specs.
   */
  router.post('/plans', requireBodyFields('spec'), (req, res, next) => {
    try {
      const { plan, warnings } = service.plan(specFromBody(bodyField(req, 'spec')));
      res.json({ plan, warnings });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

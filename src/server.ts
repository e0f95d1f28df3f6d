/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 * Runs go to the simulated host unless a host is injected, so the API never
 * touches the machine it is served from by default.
 */

import express from 'express';
import { ProvisioningHost } from './adapters/host/interface';
import { SimulatedHost } from './adapters/host/simulated-host';
import { StrataConfig, loadConfig } from './config';
import { CURRENT_SPEC_VERSION } from './dsl/version';
import { ProvisioningService } from './engine/provisioner';
import { errorHandler } from './api/middleware';
import { createPlanRoutes } from './api/plans';
import { createRunRoutes } from './api/runs';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';

export const ENGINE_VERSION = '0.1.0';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: StrataConfig;
  store: Store;
  host: ProvisioningHost;
  service: ProvisioningService;
}

/** Create the application context with all services. */
export function createAppContext(
  overrides: { config?: StrataConfig; store?: Store; host?: ProvisioningHost } = {},
): AppContext {
  const config = overrides.config ?? loadConfig();
  const store = overrides.store ?? createMemoryStore();
  const host = overrides.host ?? new SimulatedHost();
  const service = new ProvisioningService(store, host, config);

  return { config, store, host, service };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  // Body parsing
  app.use(express.json({ limit: '10mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: ENGINE_VERSION,
      specVersion: CURRENT_SPEC_VERSION,
      uptimeMs: Date.now() - startTime,
      host: ctx.host instanceof SimulatedHost ? 'simulated' : 'shell',
    });
  });

  app.use('/api', createPlanRoutes(ctx.service));
  app.use('/api', createRunRoutes(ctx.service));

  // Error handler
  app.use(errorHandler);

  return app;
}

/**
 * strata serve [--port=<n>] [--shell]
 */

import { ShellHost } from '../../adapters/host/shell-host';
import { SimulatedHost } from '../../adapters/host/simulated-host';
import { logger } from '../../logger';
import { createApp, createAppContext } from '../../server';
import { ParsedArgs, flagBoolean } from '../args';
import { CliContext, EXIT_OK, resolveConfig } from '../context';

/** Serve the HTTP API until SIGINT or SIGTERM. */
export async function serveCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const config = resolveConfig(args, ctx);
  const host = ctx.host ?? (flagBoolean(args, 'shell') ? new ShellHost({ cwd: ctx.cwd }) : new SimulatedHost());
  const app = createApp(createAppContext({ config, host }));

  return new Promise<number>((resolve, reject) => {
    const server = app.listen(config.port, () => {
      ctx.io.out(`strata API listening on port ${config.port}`);
      logger.info('Server started', { port: config.port, host: host instanceof SimulatedHost ? 'simulated' : 'shell' });
    });
    server.once('error', reject);

    const shutdown = () => {
      process.removeListener('SIGINT', shutdown);
      process.removeListener('SIGTERM', shutdown);
      server.close((err) => (err ? reject(err) : resolve(EXIT_OK)));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
}

/**
 * Command dispatcher.
 */

import { parseArgs } from './args';
import { migrateSnapshotCommand } from './commands/migrate-snapshot';
import { planCommand } from './commands/plan';
import { provisionCommand } from './commands/provision';
import { serveCommand } from './commands/serve';
import { verifyCommand } from './commands/verify';
import { CliContext, EXIT_FAILURE, EXIT_OK, reportError } from './context';
import { consoleIo } from './output';

export async function runCli(argv: string[], overrides: Partial<CliContext> = {}): Promise<number> {
  const ctx: CliContext = {
    io: overrides.io ?? consoleIo,
    env: overrides.env ?? process.env,
    cwd: overrides.cwd ?? process.cwd(),
    host: overrides.host,
  };
  const command = argv[0] ?? 'help';
  const args = parseArgs(argv.slice(1));

  if (args.flags.get('help') === true && command !== 'help') {
    printHelp(ctx);
    return EXIT_OK;
  }

  try {
    switch (command) {
      case 'provision':
        return await provisionCommand(args, ctx);

      case 'verify':
        return await verifyCommand(args, ctx);

      case 'plan':
        return await planCommand(args, ctx);

      case 'serve':
        return await serveCommand(args, ctx);

      case 'migrate-snapshot':
        return await migrateSnapshotCommand(args, ctx);

      case 'help':
      case '--help':
      case '-h':
        printHelp(ctx);
        return EXIT_OK;

      default:
        ctx.io.err(`Unknown command: ${command}`);
        printHelp(ctx);
        return EXIT_FAILURE;
    }
  } catch (err) {
    reportError(ctx, err);
    return EXIT_FAILURE;
  }
}

function printHelp(ctx: CliContext): void {
  ctx.io.out(`
strata - declarative environment provisioning

Usage: strata <command> [options]

Commands:
  provision <spec>         Apply a specification, skipping satisfied steps
  verify <spec>            Re-check every postcondition against the snapshot
  plan <spec>              Print the execution order
  serve                    Start the HTTP API
  migrate-snapshot <file>  Rewrite a snapshot file in the current schema
  help                     Show this help message

Options:
  --snapshot <file>   Snapshot file (default: <spec>.snapshot.json)
  --retries=<n>       Retries for fetch-artifact and install-package (default 3)
  --parallel=<n>      Steps applied concurrently (default 1)
  --dry-run           Report what would be applied without doing it
  --simulate          Apply against an in-memory host
  --port=<n>          API port for serve (default 5000)
  --shell             Let the API drive this machine instead of the in-memory host
  --json              Print the plan as JSON
  --verbose           Debug logging on stderr

Exit codes: 0 success, 1 failure, 2 malformed specification
`);
}

/**
 * strata migrate-snapshot <snapshot-file>
 */

import { migrateSnapshotFile } from '../../storage/snapshot-file';
import { ParsedArgs } from '../args';
import { CliContext, EXIT_FAILURE, EXIT_OK, reportError, resolvePath } from '../context';

export async function migrateSnapshotCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const fileArg = args.positionals[0];
  if (!fileArg) {
    ctx.io.err('Usage: strata migrate-snapshot <snapshot-file>');
    return EXIT_FAILURE;
  }
  const filePath = resolvePath(ctx, fileArg);
  try {
    const { from, to } = await migrateSnapshotFile(filePath);
    ctx.io.out(from === to ? `${filePath} is already at schema ${to}` : `Migrated ${filePath} from schema ${from} to ${to}`);
    return EXIT_OK;
  } catch (err) {
    reportError(ctx, err);
    return EXIT_FAILURE;
  }
}

/**
 * strata verify <spec-file> --snapshot <file>
 */

import { Snapshot } from '../../domain/snapshot';
import { loadSpecFile } from '../../dsl/parser';
import { CompiledSpec, compileValidation } from '../../engine/provisioner';
import { verify } from '../../engine/verifier';
import { SnapshotFile, defaultSnapshotPath, loadSnapshotFile } from '../../storage/snapshot-file';
import { ParsedArgs, flagString } from '../args';
import { CliContext, EXIT_FAILURE, EXIT_MALFORMED_SPEC, EXIT_OK, reportError, resolveConfig, resolvePath } from '../context';
import { colorize, formatReport } from '../output';

export async function verifyCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const specArg = args.positionals[0];
  if (!specArg) {
    ctx.io.err('Usage: strata verify <spec-file> --snapshot <file>');
    return EXIT_MALFORMED_SPEC;
  }
  const specPath = resolvePath(ctx, specArg);
  resolveConfig(args, ctx);

  let compiled: CompiledSpec;
  try {
    compiled = compileValidation(await loadSpecFile(specPath));
  } catch (err) {
    reportError(ctx, err);
    return EXIT_MALFORMED_SPEC;
  }

  const explicitSnapshot = flagString(args, 'snapshot');
  const snapshotPath = explicitSnapshot ? resolvePath(ctx, explicitSnapshot) : defaultSnapshotPath(specPath);
  let file: SnapshotFile | null;
  try {
    file = await loadSnapshotFile(snapshotPath);
  } catch (err) {
    reportError(ctx, err);
    return EXIT_FAILURE;
  }
  if (!file) {
    ctx.io.err(colorize('yellow', `No snapshot at ${snapshotPath}; verifying against an empty environment`));
  }

  const report = verify(
    compiled.spec.steps,
    new Snapshot(file?.snapshot),
    file?.log ?? [],
    { pathSeparator: compiled.plan.pathSeparator },
  );
  for (const line of formatReport(report)) {
    ctx.io.out(line);
  }
  return report.passed ? EXIT_OK : EXIT_FAILURE;
}

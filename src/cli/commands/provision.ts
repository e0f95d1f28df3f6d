/**
 * strata provision <spec-file> [--snapshot <file>] [--retries=<n>] [--parallel=<n>] [--dry-run] [--simulate]
 */

import { StrataError } from '../../domain/errors';
import { ProvisioningRun, RunStatus } from '../../domain/run';
import { loadSpecFile } from '../../dsl/parser';
import { CompiledSpec, ProvisioningService, compileValidation } from '../../engine/provisioner';
import { createMemoryStore } from '../../storage/memory-store';
import { SnapshotFile, defaultSnapshotPath, loadSnapshotFile, mergeLogs, saveSnapshotFile } from '../../storage/snapshot-file';
import { ParsedArgs, flagBoolean, flagString } from '../args';
import {
  CliContext,
  EXIT_FAILURE,
  EXIT_MALFORMED_SPEC,
  EXIT_OK,
  reportError,
  reportWarnings,
  resolveConfig,
  resolveHost,
  resolvePath,
} from '../context';
import { colorize, formatPreview, formatResult } from '../output';

export async function provisionCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const specArg = args.positionals[0];
  if (!specArg) {
    ctx.io.err('Usage: strata provision <spec-file> [--snapshot <file>] [--retries=<n>] [--parallel=<n>] [--dry-run] [--simulate]');
    return EXIT_MALFORMED_SPEC;
  }
  const specPath = resolvePath(ctx, specArg);

  let compiled: CompiledSpec;
  try {
    compiled = compileValidation(await loadSpecFile(specPath));
  } catch (err) {
    reportError(ctx, err);
    return EXIT_MALFORMED_SPEC;
  }
  reportWarnings(ctx, compiled.warnings);

  const config = resolveConfig(args, ctx);
  const simulate = flagBoolean(args, 'simulate');
  const explicitSnapshot = flagString(args, 'snapshot');
  const snapshotPath = explicitSnapshot ? resolvePath(ctx, explicitSnapshot) : defaultSnapshotPath(specPath);
  // Simulated effects never land in the default snapshot of a real environment.
  const persist = !simulate || explicitSnapshot !== undefined;

  let existing: SnapshotFile | null = null;
  try {
    existing = persist ? await loadSnapshotFile(snapshotPath) : null;
  } catch (err) {
    reportError(ctx, err);
    return EXIT_FAILURE;
  }
  const service = new ProvisioningService(createMemoryStore(), resolveHost(args, ctx), config);

  if (flagBoolean(args, 'dry-run')) {
    ctx.io.out(`Dry run of ${compiled.spec.name} (${compiled.plan.order.length} steps):`);
    for (const entry of service.preview(compiled.spec, existing?.snapshot)) {
      ctx.io.out(formatPreview(entry));
    }
    return EXIT_OK;
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    ctx.io.err('Interrupted: finishing in-flight steps');
    controller.abort('interrupted');
  };
  process.once('SIGINT', onInterrupt);

  let run: ProvisioningRun;
  try {
    run = await service.provision(compiled.spec, { snapshot: existing?.snapshot, signal: controller.signal });
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  for (const result of run.results) {
    ctx.io.out(formatResult(result));
  }

  if (persist) {
    await saveSnapshotFile(snapshotPath, {
      specName: compiled.spec.name,
      snapshot: run.snapshot,
      log: mergeLogs(existing?.log ?? [], run.results),
    });
    ctx.io.out(colorize('dim', `Snapshot written to ${snapshotPath}`));
  }

  if (run.status !== RunStatus.Succeeded) {
    if (run.error) reportError(ctx, new StrataError(run.error));
    ctx.io.err(`Provisioning ${run.status}: ${run.results.length} of ${run.executionOrder.length} steps ran`);
    return EXIT_FAILURE;
  }

  ctx.io.out(colorize('green', `Provisioned ${compiled.spec.name} at revision ${run.snapshot.revision}`));
  return EXIT_OK;
}

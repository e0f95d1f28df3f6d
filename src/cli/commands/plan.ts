/**
 * strata plan <spec-file> [--json]
 */

import { loadSpecFile } from '../../dsl/parser';
import { CompiledSpec, compileValidation } from '../../engine/provisioner';
import { describePostcondition } from '../../engine/postconditions';
import { ParsedArgs, flagBoolean } from '../args';
import { CliContext, EXIT_MALFORMED_SPEC, EXIT_OK, reportError, reportWarnings, resolveConfig, resolvePath } from '../context';
import { colorize } from '../output';

export async function planCommand(args: ParsedArgs, ctx: CliContext): Promise<number> {
  const specArg = args.positionals[0];
  if (!specArg) {
    ctx.io.err('Usage: strata plan <spec-file> [--json]');
    return EXIT_MALFORMED_SPEC;
  }
  resolveConfig(args, ctx);

  let compiled: CompiledSpec;
  try {
    compiled = compileValidation(await loadSpecFile(resolvePath(ctx, specArg)));
  } catch (err) {
    reportError(ctx, err);
    return EXIT_MALFORMED_SPEC;
  }
  reportWarnings(ctx, compiled.warnings);

  const { plan } = compiled;
  if (flagBoolean(args, 'json')) {
    ctx.io.out(JSON.stringify(plan, null, 2));
    return EXIT_OK;
  }

  ctx.io.out(`Plan for ${plan.specName} (${plan.order.length} steps, ${plan.planHash.slice(0, 12)})`);
  plan.order.forEach((id, i) => {
    const step = plan.steps[id];
    const requires = step.requires.length > 0 ? colorize('dim', ` after ${step.requires.join(', ')}`) : '';
    ctx.io.out(`${String(i + 1).padStart(3)}. ${id} [${step.kind}]${requires}`);
    ctx.io.out(`     ${colorize('dim', describePostcondition(step))}`);
  });
  return EXIT_OK;
}

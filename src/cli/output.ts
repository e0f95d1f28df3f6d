/**
 * Human-readable CLI output.
 */

import { TypedError } from '../domain/errors';
import { StepResult, StepResultStatus } from '../domain/run';
import { VerificationDetail, VerificationReport } from '../domain/verification';
import { PreviewEntry } from '../engine/executor';

/** Where command output goes. */
export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const DIM = '\x1b[2m';
const RESET = '\x1b[0m';

let colorEnabled = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

export function setColorEnabled(enabled: boolean): void {
  colorEnabled = enabled;
}

export function colorize(color: 'green' | 'red' | 'yellow' | 'dim', text: string): string {
  if (!colorEnabled) return text;
  const code = { green: GREEN, red: RED, yellow: YELLOW, dim: DIM }[color];
  return `${code}${text}${RESET}`;
}

export function formatError(error: TypedError): string[] {
  const lines = [`${colorize('red', '✗')} ${error.code}: ${error.message}`];
  for (const fix of error.suggestedFixes) {
    if (fix.description) lines.push(`  hint: ${fix.description}`);
  }
  return lines;
}

export function formatResult(result: StepResult): string {
  switch (result.status) {
    case StepResultStatus.Applied: {
      const retries = result.attempts > 1 ? `, ${result.attempts} attempts` : '';
      return `${colorize('green', '✓')} applied  ${result.stepId} ${colorize('dim', `(revision ${result.revision ?? '?'}${retries})`)}`;
    }
    case StepResultStatus.Skipped:
      return `${colorize('dim', '-')} skipped  ${result.stepId} ${colorize('dim', '(already satisfied)')}`;
    case StepResultStatus.Failed:
      return `${colorize('red', '✗')} failed   ${result.stepId}: ${result.error?.code ?? 'UNKNOWN'} ${result.error?.message ?? ''}`.trimEnd();
  }
}

export function formatPreview(entry: PreviewEntry): string {
  return entry.action === 'apply'
    ? `${colorize('yellow', '+')} apply    ${entry.stepId} ${colorize('dim', `(${entry.postcondition})`)}`
    : `${colorize('dim', '-')} skip     ${entry.stepId} ${colorize('dim', `(${entry.postcondition})`)}`;
}

export function formatReport(report: VerificationReport): string[] {
  const lines = report.entries.map((entry) => {
    const mark = entry.holds ? colorize('green', '✓') : colorize('red', '✗');
    const observed =
      !entry.holds && entry.detail !== VerificationDetail.NeverAttempted
        ? ` observed ${entry.observed === undefined ? 'nothing' : `"${entry.observed}"`}`
        : '';
    return `${mark} ${entry.stepId}: ${entry.detail} ${colorize('dim', `(${entry.postcondition})`)}${observed}`;
  });
  const failing = report.entries.filter((e) => !e.holds).length;
  lines.push(
    report.passed
      ? colorize('green', `Verification passed at revision ${report.revision}`)
      : colorize('red', `Verification failed: ${failing} of ${report.entries.length} postconditions do not hold`),
  );
  return lines;
}

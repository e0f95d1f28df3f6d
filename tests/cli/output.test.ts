import { formatError, formatReport, formatResult, setColorEnabled } from '../../src/cli/output';
import { conflictError } from '../../src/domain/errors';
import { StepResultStatus } from '../../src/domain/run';
import { VerificationDetail } from '../../src/domain/verification';

const TIMES = { startedAt: '2026-01-01T00:00:00.000Z', completedAt: '2026-01-01T00:00:01.000Z', durationMs: 1000 };

describe('CLI output', () => {
  beforeAll(() => setColorEnabled(false));

  test('formats step results', () => {
    expect(formatResult({ stepId: 'jq', status: StepResultStatus.Applied, attempts: 2, revision: 4, ...TIMES })).toBe(
      '✓ applied  jq (revision 4, 2 attempts)',
    );
    expect(formatResult({ stepId: 'jq', status: StepResultStatus.Skipped, attempts: 0, ...TIMES })).toBe(
      '- skipped  jq (already satisfied)',
    );
  });

  test('formats an error with its hints', () => {
    expect(formatError(conflictError(['open', 'lock'], 'mode:run.sh'))).toEqual([
      '✗ STEP.CONFLICT: Steps "open" and "lock" both write "mode:run.sh" with no prerequisite ordering between them',
      '  hint: Make "lock" require "open"',
    ]);
  });

  test('formats a verification report', () => {
    const lines = formatReport({
      revision: 2,
      passed: false,
      generatedAt: '2026-01-01T00:00:00.000Z',
      entries: [
        { stepId: 'jq', postcondition: 'package:jq is present', holds: true, detail: VerificationDetail.Satisfied, observed: '1.7' },
        { stepId: 'perm', postcondition: 'mode:run.sh == 755', holds: false, detail: VerificationDetail.DriftDetected, observed: '644' },
        { stepId: 'path', postcondition: 'envvar:PATH contains "/opt"', holds: false, detail: VerificationDetail.NeverAttempted },
      ],
    });

    expect(lines).toEqual([
      '✓ jq: Satisfied (package:jq is present)',
      '✗ perm: DriftDetected (mode:run.sh == 755) observed "644"',
      '✗ path: NeverAttempted (envvar:PATH contains "/opt")',
      'Verification failed: 2 of 3 postconditions do not hold',
    ]);
  });
});

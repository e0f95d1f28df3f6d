import { classifyCommandFailure, classifyError, errorCode } from '../../src/adapters/host/classify';
import { NonTransientActionError, TransientActionError } from '../../src/domain/errors';

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('Failure classification', () => {
  test('passes action errors through unchanged', () => {
    const err = new TransientActionError('slow mirror');
    expect(classifyError(err, 'ctx')).toBe(err);
  });

  test('connection errors are transient', () => {
    const classified = classifyError(withCode('socket hang up', 'ECONNRESET'), 'GET https://example.test');
    expect(classified).toBeInstanceOf(TransientActionError);
    expect(classified.reason).toBe('ECONNRESET');
    expect(classified.message).toBe('GET https://example.test: socket hang up');
  });

  test('reads the code from a fetch failure cause', () => {
    const err = new TypeError('fetch failed', { cause: withCode('connect timeout', 'UND_ERR_CONNECT_TIMEOUT') });
    expect(errorCode(err)).toBe('UND_ERR_CONNECT_TIMEOUT');
    expect(classifyError(err, 'GET')).toBeInstanceOf(TransientActionError);
  });

  test('aborts are transient timeouts', () => {
    const err = new Error('aborted');
    err.name = 'AbortError';
    expect(classifyError(err, 'ctx').reason).toBe('timeout');
  });

  test('permission errors are non-transient', () => {
    const classified = classifyError(withCode('operation not permitted', 'EPERM'), 'chmod /etc/hosts');
    expect(classified).toBeInstanceOf(NonTransientActionError);
    expect(classified.reason).toBe('permission-denied');
  });

  test('command output decides transience', () => {
    const network = classifyCommandFailure('pip install numpy', 1, 'ERROR: Connection reset by peer\n');
    expect(network).toBeInstanceOf(TransientActionError);
    expect(network.message).toBe('pip install numpy exited with status 1: ERROR: Connection reset by peer');

    const denied = classifyCommandFailure('apt-get install -y jq', 100, 'E: Permission denied');
    expect(denied.reason).toBe('permission-denied');

    const missing = classifyCommandFailure('pip install nope', 1, 'ERROR: No matching distribution found for nope');
    expect(missing).toBeInstanceOf(NonTransientActionError);
    expect(missing.reason).toBe('exit-status');
  });
});

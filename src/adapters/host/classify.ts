/**
 * Failure classification for host operations.
 */

import { NonTransientActionError, TransientActionError } from '../../domain/errors';

/** Node/undici error codes worth retrying. */
export const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EAI_AGAIN',
  'EPIPE',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_SOCKET',
]);

export const PERMISSION_ERROR_CODES = new Set(['EACCES', 'EPERM', 'EROFS']);

/** Output patterns from package managers that indicate a network hiccup. */
const TRANSIENT_OUTPUT = /connection (reset|timed out|refused)|read timed out|temporary failure|could not resolve|network is unreachable|ECONNRESET|ETIMEDOUT/i;
const PERMISSION_OUTPUT = /permission denied|EACCES|are you root/i;

/** The errno-style code of an error or of its cause. */
export function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('code' in err && typeof err.code === 'string') return err.code;
  if ('cause' in err) return errorCode(err.cause);
  return undefined;
}

/** Map a thrown error to the action error taxonomy. */
export function classifyError(err: unknown, context: string): TransientActionError | NonTransientActionError {
  if (err instanceof TransientActionError || err instanceof NonTransientActionError) return err;

  const message = `${context}: ${err instanceof Error ? err.message : String(err)}`;
  if (err instanceof Error && err.name === 'AbortError') {
    return new TransientActionError(message, 'timeout');
  }
  const code = errorCode(err);
  if (code && TRANSIENT_ERROR_CODES.has(code)) {
    return new TransientActionError(message, code);
  }
  if (code && PERMISSION_ERROR_CODES.has(code)) {
    return new NonTransientActionError(message, 'permission-denied');
  }
  return new NonTransientActionError(message, code ?? 'error');
}

/** Classify a failed command by its output. */
export function classifyCommandFailure(
  command: string,
  exitCode: number | null,
  output: string,
): TransientActionError | NonTransientActionError {
  const message = `${command} exited with ${exitCode === null ? 'no status' : `status ${exitCode}`}: ${lastLine(output)}`;
  if (TRANSIENT_OUTPUT.test(output)) return new TransientActionError(message, 'network');
  if (PERMISSION_OUTPUT.test(output)) return new NonTransientActionError(message, 'permission-denied');
  return new NonTransientActionError(message, 'exit-status');
}

function lastLine(output: string): string {
  const lines = output.trim().split('\n');
  return lines[lines.length - 1] ?? '';
}

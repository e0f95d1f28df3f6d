/**
 * Child-process exec adapter.
 */

import { spawn } from 'child_process';
import { ExecAdapter, ExecOptions, ExecResult } from './interface';

/**
 * Runs a command without a shell and resolves with its output, duration and
 * exit metadata. Never rejects: spawn errors are reported in the result.
 */
const nodeExec: ExecAdapter = {
  async run(opts: ExecOptions): Promise<ExecResult> {
    const { command, args, cwd, env, timeoutMs, signal } = opts;

    const start = Date.now();

    return new Promise<ExecResult>((resolve) => {
      const child = spawn(command, args, {
        cwd,
        env: { ...process.env, ...(env || {}) },
      });

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let timeoutTimer: NodeJS.Timeout | undefined;

      if (child.stdout) child.stdout.on('data', (d: Buffer) => (stdout += d.toString()));
      if (child.stderr) child.stderr.on('data', (d: Buffer) => (stderr += d.toString()));

      const onAbort = () => {
        timedOut = true;
        child.kill('SIGTERM');
      };

      const cleanup = () => {
        if (timeoutTimer) clearTimeout(timeoutTimer);
        signal?.removeEventListener('abort', onAbort);
      };

      if (typeof timeoutMs === 'number' && timeoutMs > 0) {
        timeoutTimer = setTimeout(onAbort, timeoutMs);
      }
      if (signal) {
        if (signal.aborted) onAbort();
        else signal.addEventListener('abort', onAbort, { once: true });
      }

      child.on('error', (err: NodeJS.ErrnoException) => {
        cleanup();
        const durationMs = Date.now() - start;
        resolve({ code: null, stdout, stderr, durationMs, signal: null, timedOut, error: { code: err.code, message: err.message } });
      });

      child.on('close', (code, exitSignal) => {
        cleanup();
        const durationMs = Date.now() - start;
        resolve({ code, stdout, stderr, durationMs, signal: exitSignal, timedOut });
      });
    });
  },
};

export default nodeExec;

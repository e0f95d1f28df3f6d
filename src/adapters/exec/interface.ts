/**
 * Process execution interface.
 */

export interface ExecOptions {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ExecResult {
  code: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  signal?: NodeJS.Signals | null;
  timedOut?: boolean;
  /** Spawn failure (e.g. ENOENT when the command does not exist). */
  error?: { code?: string; message: string };
}

export interface ExecAdapter {
  run(opts: ExecOptions): Promise<ExecResult>;
}

/**
 * Shell provisioning host.
 *
 * Drives the machine it runs on: package managers through child processes,
 * artifact downloads through fetch, permissions through fs.chmod.
 */

import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import path from 'path';
import { NonTransientActionError, TransientActionError } from '../../domain/errors';
import { ExecAdapter, ExecOptions } from '../exec/interface';
import nodeExec from '../exec/node-process';
import { classifyCommandFailure, classifyError } from './classify';
import {
  CreateInterpreterEnvRequest,
  FetchArtifactRequest,
  HostCallContext,
  InstallPackageRequest,
  ProvisioningHost,
  SetPermissionRequest,
} from './interface';

export type CommandLine = Pick<ExecOptions, 'command' | 'args'>;

/** Command builders for package-manager operations. */
export interface CommandSet {
  installPackage(request: InstallPackageRequest): CommandLine;
  createInterpreterEnv(request: CreateInterpreterEnvRequest): CommandLine;
}

export const DEFAULT_COMMANDS: CommandSet = {
  installPackage(request) {
    const { name, version, manager, env } = request;
    switch (manager) {
      case 'conda':
        return {
          command: 'conda',
          args: ['install', '-y', ...(env ? ['-n', env] : []), version ? `${name}=${version}` : name],
        };
      case 'apt':
        return { command: 'apt-get', args: ['install', '-y', version ? `${name}=${version}` : name] };
      case 'pip': {
        const requirement = version ? `${name}==${version}` : name;
        return env
          ? { command: 'conda', args: ['run', '-n', env, 'python', '-m', 'pip', 'install', requirement] }
          : { command: 'python', args: ['-m', 'pip', 'install', requirement] };
      }
    }
  },
  createInterpreterEnv(request) {
    return { command: 'conda', args: ['create', '-y', '-n', request.name, `python=${request.pythonVersion}`] };
  },
};

export interface ShellHostOptions {
  exec?: ExecAdapter;
  commands?: Partial<CommandSet>;
  /** Working directory for relative artifact destinations and commands. */
  cwd?: string;
}

export class ShellHost implements ProvisioningHost {
  private exec: ExecAdapter;
  private commands: CommandSet;
  private cwd: string;

  constructor(options: ShellHostOptions = {}) {
    this.exec = options.exec ?? nodeExec;
    this.commands = { ...DEFAULT_COMMANDS, ...options.commands };
    this.cwd = options.cwd ?? process.cwd();
  }

  async installPackage(request: InstallPackageRequest, ctx: HostCallContext): Promise<{ version?: string }> {
    await this.runCommand(this.commands.installPackage(request), ctx);
    return { version: request.version };
  }

  async createInterpreterEnv(
    request: CreateInterpreterEnvRequest,
    ctx: HostCallContext,
  ): Promise<{ pythonVersion: string }> {
    await this.runCommand(this.commands.createInterpreterEnv(request), ctx);
    return { pythonVersion: request.pythonVersion };
  }

  async fetchArtifact(request: FetchArtifactRequest, ctx: HostCallContext): Promise<{ sha256: string }> {
    let body: Buffer;
    try {
      const response = await fetch(request.url, { signal: ctx.signal });
      if (!response.ok) {
        const message = `GET ${request.url} returned ${response.status}`;
        if (response.status === 429 || response.status >= 500) {
          throw new TransientActionError(message, `http-${response.status}`);
        }
        throw new NonTransientActionError(message, `http-${response.status}`);
      }
      body = Buffer.from(await response.arrayBuffer());
    } catch (err) {
      throw classifyError(err, `GET ${request.url}`);
    }

    const digest = createHash('sha256').update(body).digest('hex');
    if (request.sha256 && digest !== request.sha256.toLowerCase()) {
      throw new NonTransientActionError(
        `Checksum mismatch for ${request.url}: expected ${request.sha256.toLowerCase()}, got ${digest}`,
        'checksum-mismatch',
      );
    }

    const destination = path.resolve(this.cwd, request.destination);
    try {
      await fs.mkdir(path.dirname(destination), { recursive: true });
      await fs.writeFile(destination, body);
    } catch (err) {
      throw classifyError(err, `write ${destination}`);
    }
    return { sha256: digest };
  }

  async setPermission(request: SetPermissionRequest, _ctx: HostCallContext): Promise<{ mode: string }> {
    const target = path.resolve(this.cwd, request.path);
    try {
      await fs.chmod(target, parseInt(request.mode, 8));
      const stat = await fs.stat(target);
      return { mode: (stat.mode & 0o7777).toString(8).padStart(3, '0') };
    } catch (err) {
      throw classifyError(err, `chmod ${target}`);
    }
  }

  private async runCommand(line: CommandLine, ctx: HostCallContext): Promise<void> {
    const rendered = [line.command, ...line.args].join(' ');
    const result = await this.exec.run({
      command: line.command,
      args: line.args,
      cwd: this.cwd,
      timeoutMs: ctx.timeoutMs,
      signal: ctx.signal,
    });

    if (result.error) {
      throw result.error.code === 'ENOENT'
        ? new NonTransientActionError(`${line.command}: command not found`, 'command-not-found')
        : classifyError(Object.assign(new Error(result.error.message), { code: result.error.code }), rendered);
    }
    if (result.timedOut) {
      throw new TransientActionError(`${rendered} timed out after ${result.durationMs}ms`, 'timeout');
    }
    if (result.code !== 0) {
      throw classifyCommandFailure(rendered, result.code, `${result.stdout}\n${result.stderr}`);
    }
  }
}

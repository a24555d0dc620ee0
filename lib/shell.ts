import { spawn } from 'child_process';
import {
  CommandFailedError,
  CommandTimeoutError,
  RemoteUnreachableError,
} from './errors';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ExecOptions {
  /** Written to the command's stdin, then stdin is closed. */
  input?: string;
  timeoutMs?: number;
  /** Called once per complete output line, as soon as it arrives. */
  onLine?: (line: string, stream: 'stdout' | 'stderr') => void;
}

/**
 * Where deployment commands run: the managed host over SSH, or the machine
 * the tool itself runs on. Non-zero exits resolve normally; only a lost
 * connection or a timeout rejects.
 */
export interface RemoteShell {
  readonly target: string;
  exec(command: string, options?: ExecOptions): Promise<CommandResult>;
}

const SSH_TARGET_HOST_RE = /^(?:[A-Za-z0-9._-]+@)?(?:[A-Za-z0-9._-]+|\[[0-9a-fA-F:]+\])$/;

export function shellQuote(value: string): string {
  if (value.length === 0) return "''";
  return `'${value.replace(/'/g, "'\\''")}'`;
}

export function validateTargetHost(targetHost: string): string {
  const host = targetHost.trim();
  if (!host || host.startsWith('-') || !SSH_TARGET_HOST_RE.test(host)) {
    throw new RemoteUnreachableError(targetHost, 'invalid target host: expected ssh alias or user@host');
  }
  return host;
}

// Splits a byte stream into lines, holding back an unterminated tail.
export class LineSplitter {
  private pending = '';

  constructor(private readonly emit: (line: string) => void) {}

  push(chunk: string): void {
    this.pending += chunk;
    let newline = this.pending.indexOf('\n');
    while (newline !== -1) {
      this.emit(this.pending.slice(0, newline).replace(/\r$/, ''));
      this.pending = this.pending.slice(newline + 1);
      newline = this.pending.indexOf('\n');
    }
  }

  flush(): void {
    if (this.pending.length > 0) {
      this.emit(this.pending);
      this.pending = '';
    }
  }
}

function spawnCommand(
  target: string,
  cmd: string,
  args: string[],
  label: string,
  options: ExecOptions,
): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve, reject) => {
    let settled = false;
    let stdout = '';
    let stderr = '';

    const child = spawn(cmd, args, { stdio: ['pipe', 'pipe', 'pipe'] });

    const outLines = new LineSplitter((line) => options.onLine?.(line, 'stdout'));
    const errLines = new LineSplitter((line) => options.onLine?.(line, 'stderr'));

    const timeout = options.timeoutMs
      ? setTimeout(() => {
          if (settled) return;
          settled = true;
          child.kill('SIGTERM');
          reject(new CommandTimeoutError(label, options.timeoutMs ?? 0));
        }, options.timeoutMs)
      : null;

    child.stdout.on('data', (data: Buffer) => {
      const text = data.toString();
      stdout += text;
      outLines.push(text);
    });

    child.stderr.on('data', (data: Buffer) => {
      const text = data.toString();
      stderr += text;
      errLines.push(text);
    });

    child.on('error', (error) => {
      if (timeout) clearTimeout(timeout);
      if (settled) return;
      settled = true;
      reject(new RemoteUnreachableError(target, `failed to start ${cmd}: ${error.message}`));
    });

    child.on('close', (code) => {
      if (timeout) clearTimeout(timeout);
      if (settled) return;
      settled = true;
      outLines.flush();
      errLines.flush();
      resolve({ exitCode: code ?? 1, stdout, stderr });
    });

    // A child that exits early closes stdin under us; that shows up as EPIPE.
    child.stdin.on('error', () => undefined);
    if (options.input !== undefined) {
      child.stdin.write(options.input);
    }
    child.stdin.end();
  });
}

export class SshShell implements RemoteShell {
  readonly target: string;

  constructor(targetHost: string, private readonly defaultTimeoutMs?: number) {
    this.target = validateTargetHost(targetHost);
  }

  async exec(command: string, options: ExecOptions = {}): Promise<CommandResult> {
    const args = ['-o', 'BatchMode=yes', '-o', 'ConnectTimeout=15', '--', this.target, command];
    const result = await spawnCommand(this.target, 'ssh', args, command, {
      ...options,
      timeoutMs: options.timeoutMs ?? this.defaultTimeoutMs,
    });

    // ssh reserves 255 for its own failures (refused, auth, dropped connection).
    if (result.exitCode === 255) {
      throw new RemoteUnreachableError(this.target, result.stderr.trim() || 'ssh exited with code 255');
    }
    return result;
  }
}

export class LocalShell implements RemoteShell {
  readonly target = 'localhost';

  constructor(private readonly defaultTimeoutMs?: number) {}

  exec(command: string, options: ExecOptions = {}): Promise<CommandResult> {
    return spawnCommand(this.target, 'bash', ['-c', command], command, {
      ...options,
      timeoutMs: options.timeoutMs ?? this.defaultTimeoutMs,
    });
  }
}

export async function execOrThrow(
  shell: RemoteShell,
  command: string,
  options: ExecOptions & { label?: string } = {},
): Promise<CommandResult> {
  const result = await shell.exec(command, options);
  if (result.exitCode !== 0) {
    throw new CommandFailedError(options.label ?? command, result.exitCode, result.stderr || result.stdout);
  }
  return result;
}

export function readFileCommand(filePath: string): string {
  return `cat -- ${shellQuote(filePath)}`;
}

export function writeFileCommand(filePath: string, mode: string = '644'): string {
  const tmp = `${filePath}.hms-tmp`;
  return `install -m ${mode} /dev/stdin ${shellQuote(tmp)} && mv -f ${shellQuote(tmp)} ${shellQuote(filePath)}`;
}

// Contents of a remote file, or null when it does not exist.
export async function readRemoteFile(shell: RemoteShell, filePath: string): Promise<string | null> {
  const command = readFileCommand(filePath);
  const result = await shell.exec(command);
  if (result.exitCode === 0) return result.stdout;
  if (/No such file or directory/.test(result.stderr)) return null;
  throw new CommandFailedError(command, result.exitCode, result.stderr);
}

/**
 * Writes through a temporary sibling and renames it into place, so readers
 * never observe a half-written file. Content travels over stdin.
 */
export async function writeRemoteFileAtomic(
  shell: RemoteShell,
  filePath: string,
  content: string,
  mode: string = '644',
): Promise<void> {
  await execOrThrow(shell, writeFileCommand(filePath, mode), { input: content });
}

export interface ScriptOptions extends ExecOptions {
  /** Exported before the script runs; never placed on a command line. */
  env?: Record<string, string>;
  /** Run as this user through sudo. */
  user?: string;
  /** Shown in errors and logs instead of the script body. */
  label: string;
}

export function scriptCommand(user?: string): string {
  return user ? `sudo -u ${shellQuote(user)} -H bash -s` : 'bash -s';
}

export function renderScript(script: string, env: Record<string, string> = {}): string {
  const exports = Object.keys(env)
    .sort()
    .map((name) => `export ${name}=${shellQuote(env[name])}`);
  return [...exports, 'set -e', script, ''].join('\n');
}

// Feeds a script to bash on stdin so secret values stay out of argv.
export async function runScript(
  shell: RemoteShell,
  script: string,
  options: ScriptOptions,
): Promise<CommandResult> {
  const { env, user, label, ...execOptions } = options;
  return execOrThrow(shell, scriptCommand(user), {
    ...execOptions,
    input: renderScript(script, env),
    label,
  });
}

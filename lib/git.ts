import { promises as fs } from 'fs';
import path from 'path';
import simpleGit from 'simple-git';
import { InvalidInputError } from './errors';
import type { ApplicationRecord } from './models';
import type { RemoteShell } from './shell';
import { runScript, shellQuote } from './shell';

export interface FetchResult {
  commit: string;
  cloned: boolean;
}

export interface FetchOptions {
  user?: string;
  timeoutMs?: number;
  onLine?: (line: string) => void;
}

/**
 * Brings `app.deployPath` to the tip of `app.branch`. Private repositories are
 * only reachable over SSH, so every source is fetched through an SSH remote.
 */
export interface SourceFetcher {
  fetch(app: ApplicationRecord, options?: FetchOptions): Promise<FetchResult>;
}

/**
 * `https://github.com/owner/repo` -> `git@github.com:owner/repo.git`.
 * SSH remotes (scp-like or ssh://) pass through unchanged.
 */
export function toSshRemote(repository: string): string {
  const value = repository.trim();
  if (/^ssh:\/\//.test(value) || /^[A-Za-z0-9._-]+@[A-Za-z0-9.-]+:/.test(value)) {
    return value;
  }

  const match = value.match(/^(?:https?|git):\/\/(?:[^@/]+@)?([^/:]+)(?::\d+)?\/(.+?)\/?$/);
  if (!match) {
    throw new InvalidInputError(`Unsupported repository URL: ${repository}`);
  }
  const [, host, repoPath] = match;
  const normalized = repoPath.endsWith('.git') ? repoPath : `${repoPath}.git`;
  return `git@${host}:${normalized}`;
}

const GIT_SSH_COMMAND = 'ssh -o BatchMode=yes -o StrictHostKeyChecking=accept-new';

export function fetchScript(app: ApplicationRecord): string {
  const remote = shellQuote(toSshRemote(app.sourceRepository));
  const branch = shellQuote(app.branch);
  const target = shellQuote(app.deployPath);
  return [
    `export GIT_SSH_COMMAND=${shellQuote(GIT_SSH_COMMAND)}`,
    `if [ -d ${target}/.git ]; then`,
    `  cd ${target}`,
    `  git remote set-url origin ${remote}`,
    `  git fetch --prune origin ${branch}`,
    `  git reset --hard origin/${app.branch}`,
    `  echo "hms:updated"`,
    'else',
    `  git clone --branch ${branch} --single-branch ${remote} ${target}`,
    `  cd ${target}`,
    `  echo "hms:cloned"`,
    'fi',
    'echo "hms:commit $(git rev-parse HEAD)"',
  ].join('\n');
}

export function parseFetchOutput(output: string): FetchResult {
  const commit = output.match(/^hms:commit ([0-9a-f]{7,40})$/m)?.[1] ?? 'unknown';
  return { commit, cloned: /^hms:cloned$/m.test(output) };
}

// Runs git on the managed host through the remote shell.
export class RemoteSourceFetcher implements SourceFetcher {
  constructor(private readonly shell: RemoteShell) {}

  async fetch(app: ApplicationRecord, options: FetchOptions = {}): Promise<FetchResult> {
    if (!/^[A-Za-z0-9._/-]+$/.test(app.branch)) {
      throw new InvalidInputError(`Invalid branch name: ${app.branch}`);
    }
    const result = await runScript(this.shell, fetchScript(app), {
      label: `git fetch ${app.appKey}@${app.branch}`,
      user: options.user,
      timeoutMs: options.timeoutMs,
      onLine: options.onLine ? (line) => options.onLine?.(line) : undefined,
    });
    return parseFetchOutput(result.stdout);
  }
}

// Drives a checkout on this machine with simple-git (used with --local).
export class LocalSourceFetcher implements SourceFetcher {
  async fetch(app: ApplicationRecord, options: FetchOptions = {}): Promise<FetchResult> {
    const remote = toSshRemote(app.sourceRepository);
    const gitOptions = { timeout: options.timeoutMs ? { block: options.timeoutMs } : undefined };
    let cloned = false;

    const hasCheckout = await fs
      .stat(path.join(app.deployPath, '.git'))
      .then((stat) => stat.isDirectory())
      .catch(() => false);

    if (!hasCheckout) {
      options.onLine?.(`Cloning ${remote} (${app.branch}) into ${app.deployPath}`);
      await simpleGit(gitOptions)
        .env('GIT_SSH_COMMAND', GIT_SSH_COMMAND)
        .clone(remote, app.deployPath, ['--branch', app.branch, '--single-branch']);
      cloned = true;
    }

    const git = simpleGit(app.deployPath, gitOptions).env('GIT_SSH_COMMAND', GIT_SSH_COMMAND);
    if (!cloned) {
      options.onLine?.(`Fetching origin/${app.branch}`);
      await git.remote(['set-url', 'origin', remote]);
      await git.fetch('origin', app.branch, ['--prune']);
      await git.reset(['--hard', `origin/${app.branch}`]);
    }

    const commit = (await git.revparse(['HEAD'])).trim();
    options.onLine?.(`At commit ${commit}`);
    return { commit, cloned };
  }
}

import os from 'os';
import path from 'path';
import { certbot } from './certbot';
import type { HostLayout } from './config';
import { ConfirmationRequiredError, InvalidInputError } from './errors';
import * as log from './logger';
import type { ApplicationRecord } from './models';
import { fqdn, serviceName } from './models';
import { certificateDir, nginx, sitePaths } from './nginx';
import { dropDatabaseAndRoleSql, psql } from './postgres';
import type { SecretStore } from './secret-store';
import type { RemoteShell } from './shell';
import { execOrThrow, shellQuote } from './shell';
import { systemctl, unitPath } from './systemctl';

export const DECOMMISSION_STEPS = [
  'stop_service',
  'kill_processes',
  'remove_service_unit',
  'remove_proxy_config',
  'remove_certificate',
  'remove_files',
  'drop_database',
] as const;

export type DecommissionStepName = (typeof DECOMMISSION_STEPS)[number];

export interface DecommissionOptions {
  force?: boolean;
  timeoutMs?: number;
  /** Called with the step name before the step runs. */
  onStepStart?: (name: DecommissionStepName) => void;
  /** Called once per finished step, as it finishes. */
  onProgress?: (line: string) => void;
}

export interface DecommissionResult {
  appKey: string;
  steps: { name: DecommissionStepName; detail: string }[];
}

function normalize(p: string): string {
  const normalized = path.posix.normalize(p);
  return normalized === '/' ? normalized : normalized.replace(/\/+$/, '');
}

function isWithin(child: string, parent: string): boolean {
  return child === parent || parent === '/' || child.startsWith(`${parent}/`);
}

/**
 * pkill -f pattern matching processes started from `dir`. The first character
 * is bracketed so the pattern does not match the shell running pkill.
 */
export function processPattern(dir: string): string {
  const escaped = dir.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  // Anchored so /srv/app does not also match /srv/app2.
  return `[${escaped[0]}]${escaped.slice(1)}(/|\\s|$)`;
}

/**
 * Removes everything a deployment created for one application. The app row
 * and anything under the backup root are left alone.
 */
export class Decommissioner {
  constructor(
    private readonly store: SecretStore,
    private readonly shell: RemoteShell,
    private readonly layout: HostLayout,
    private readonly lockHolder: string = `${os.hostname()}:${process.pid}`,
  ) {}

  async decommission(appKey: string, options: DecommissionOptions = {}): Promise<DecommissionResult> {
    if (!options.force) {
      throw new ConfirmationRequiredError(appKey);
    }

    const app = this.store.getApp(appKey);
    const deployPath = normalize(app.deployPath);
    this.assertRemovable(deployPath);

    this.store.acquireDeployLock(appKey, this.lockHolder);
    const steps: DecommissionResult['steps'] = [];
    try {
      for (const [i, name] of DECOMMISSION_STEPS.entries()) {
        log.step(i + 1, DECOMMISSION_STEPS.length, name);
        options.onStepStart?.(name);
        const detail = await this.runStep(name, app, deployPath, options.timeoutMs);
        steps.push({ name, detail });
        const line = `${name}: ${detail}`;
        log.info(`  ✓ ${line}`);
        options.onProgress?.(line);
      }
    } finally {
      this.store.releaseDeployLock(appKey, this.lockHolder);
    }

    return { appKey, steps };
  }

  private assertRemovable(deployPath: string): void {
    const backupRoot = normalize(this.layout.backupRoot);
    if (deployPath === '/') {
      throw new InvalidInputError('Refusing to remove /');
    }
    if (isWithin(deployPath, backupRoot) || isWithin(backupRoot, deployPath)) {
      throw new InvalidInputError(`Refusing to remove ${deployPath}: it overlaps the backup root ${backupRoot}`);
    }
  }

  private async runStep(
    name: DecommissionStepName,
    app: ApplicationRecord,
    deployPath: string,
    timeoutMs?: number,
  ): Promise<string> {
    const unit = serviceName(app);
    const run = (command: string, label?: string) => execOrThrow(this.shell, command, { label, timeoutMs });

    switch (name) {
      case 'stop_service':
        await run(systemctl.stop(unit));
        return `${unit} stopped`;

      case 'kill_processes':
        await run(`pkill -f -- ${shellQuote(processPattern(deployPath))} || true`);
        return `no processes left under ${deployPath}`;

      case 'remove_service_unit': {
        const file = unitPath(this.layout.systemdDir, app);
        await run(systemctl.disable(unit));
        await run(`rm -f -- ${shellQuote(file)}`);
        await run(systemctl.daemonReload());
        return `${file} removed`;
      }

      case 'remove_proxy_config': {
        const paths = sitePaths(this.layout.nginxDir, app);
        await run(nginx.removeSite(paths.available, paths.enabled));
        await run(nginx.reload());
        return `${paths.available} removed`;
      }

      case 'remove_certificate': {
        const host = fqdn(app);
        const present = await this.shell.exec(certbot.exists(certificateDir(this.layout.letsencryptDir, app)), { timeoutMs });
        if (present.exitCode !== 0) {
          return `no certificate for ${host}`;
        }
        await run(certbot.remove(host), `certbot delete ${host}`);
        return `certificate for ${host} deleted`;
      }

      case 'remove_files':
        await run(`rm -rf -- ${shellQuote(deployPath)}`);
        return `${deployPath} removed`;

      case 'drop_database':
        await psql(
          this.shell,
          dropDatabaseAndRoleSql(app.databaseName, app.databaseUsername),
          `psql: drop ${app.databaseName}`,
          timeoutMs,
        );
        return `database ${app.databaseName} and role ${app.databaseUsername} dropped`;
    }
  }
}

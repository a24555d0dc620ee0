import type { HostLayout } from './config';
import * as log from './logger';
import type { ApplicationRecord } from './models';
import { serviceName } from './models';
import { runtimeProfile } from './runtimes';
import type { SecretStore } from './secret-store';
import type { RemoteShell } from './shell';
import { execOrThrow, readRemoteFile, writeRemoteFileAtomic } from './shell';
import type { UnitTemplate } from './systemctl';
import {
  renderManagedSection,
  renderUnit,
  replaceManagedSection,
  systemctl,
  unitPath,
} from './systemctl';

export interface SecretDeployOptions {
  /** Defaults to the template of the app's runtime. */
  template?: UnitTemplate;
  /** Restart the service afterwards (default true). Off when pre-staging before a code deploy. */
  restart?: boolean;
  timeoutMs?: number;
}

export interface SecretDeployResult {
  appKey: string;
  unitPath: string;
  /** False when the unit already held exactly these secrets. */
  changed: boolean;
  created: boolean;
  restarted: boolean;
  variableCount: number;
}

/**
 * Puts an application's secrets into the managed section of its systemd unit.
 * Secrets are never written anywhere else on the host.
 */
export class SecretDeployer {
  constructor(
    private readonly store: SecretStore,
    private readonly shell: RemoteShell,
    private readonly layout: HostLayout,
  ) {}

  async deploySecrets(appKey: string, options: SecretDeployOptions = {}): Promise<SecretDeployResult> {
    // Both reads fail before anything touches the host.
    const app = this.store.getApp(appKey);
    const secrets = this.store.getDeploySecrets(appKey);
    return this.deployResolved(app, secrets, options);
  }

  async deployResolved(
    app: ApplicationRecord,
    secrets: Record<string, string>,
    options: SecretDeployOptions = {},
  ): Promise<SecretDeployResult> {
    const { restart = true, timeoutMs } = options;
    const template = options.template ?? runtimeProfile(app.runtime).template;
    const path = unitPath(this.layout.systemdDir, app);
    const section = renderManagedSection(secrets);

    const current = await readRemoteFile(this.shell, path);
    const next = current === null
      ? renderUnit(app, secrets, { template, user: this.layout.deployUser })
      : replaceManagedSection(current, path, section);

    const changed = next !== current;
    if (changed) {
      await writeRemoteFileAtomic(this.shell, path, next);
      log.debug(`Wrote ${section.length - 2} managed variables to ${path}`);
    } else {
      log.debug(`${path} already up to date`);
    }

    await execOrThrow(this.shell, systemctl.daemonReload(), { timeoutMs });

    if (current === null) {
      await execOrThrow(this.shell, systemctl.enable(serviceName(app)), { timeoutMs });
    }

    if (restart) {
      await execOrThrow(this.shell, systemctl.restart(serviceName(app)), { timeoutMs });
    }

    return {
      appKey: app.appKey,
      unitPath: path,
      changed,
      created: current === null,
      restarted: restart,
      variableCount: section.length - 2,
    };
  }
}

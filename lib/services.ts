import type { HmsConfig } from './config';
import { openDatabase } from './db';
import type { Db } from './db';
import { Decommissioner } from './decommission';
import { DeploymentOrchestrator } from './deployment';
import { ConfigError } from './errors';
import type { SourceFetcher } from './git';
import { LocalSourceFetcher, RemoteSourceFetcher } from './git';
import { HealthVerifier } from './health';
import { SecretDeployer } from './secret-deployer';
import { SecretStore } from './secret-store';
import type { RemoteShell } from './shell';
import { LocalShell, SshShell } from './shell';

export interface ServiceOptions {
  /** Run host commands on this machine instead of over SSH. */
  local?: boolean;
}

export interface Services {
  db: Db;
  store: SecretStore;
  shell: RemoteShell;
  fetcher: SourceFetcher;
  secretDeployer: SecretDeployer;
  health: HealthVerifier;
  orchestrator: DeploymentOrchestrator;
  decommissioner: Decommissioner;
  close(): void;
}

export function createShell(config: HmsConfig, options: ServiceOptions = {}): RemoteShell {
  if (options.local) {
    return new LocalShell(config.commandTimeoutMs);
  }
  if (!config.remoteHost) {
    throw new ConfigError('HMS_REMOTE_HOST is not set; set it or pass --local');
  }
  return new SshShell(config.remoteHost, config.commandTimeoutMs);
}

// Wires every component against one store and one shell.
export function assembleServices(
  db: Db,
  config: HmsConfig,
  shell: RemoteShell,
  fetcher: SourceFetcher = new RemoteSourceFetcher(shell),
): Services {
  const store = new SecretStore(db);
  const health = new HealthVerifier(store, shell, {
    layout: config.layout,
    httpTimeoutMs: config.httpTimeoutMs,
    commandTimeoutMs: config.commandTimeoutMs,
  });

  return {
    db,
    store,
    shell,
    fetcher,
    secretDeployer: new SecretDeployer(store, shell, config.layout),
    health,
    orchestrator: new DeploymentOrchestrator({
      store,
      shell,
      fetcher,
      layout: config.layout,
      health,
      commandTimeoutMs: config.commandTimeoutMs,
    }),
    decommissioner: new Decommissioner(store, shell, config.layout),
    close: () => db.close(),
  };
}

export function createServices(config: HmsConfig, options: ServiceOptions = {}): Services {
  const shell = createShell(config, options);
  const fetcher = options.local ? new LocalSourceFetcher() : new RemoteSourceFetcher(shell);
  return assembleServices(openDatabase(config.dbPath), config, shell, fetcher);
}

// Store-only commands (apps, secrets set, history) never need a host.
export function openStore(config: HmsConfig): { store: SecretStore; close(): void } {
  const db = openDatabase(config.dbPath);
  return { store: new SecretStore(db), close: () => db.close() };
}

import os from 'os';
import type { HostLayout } from './config';
import { CommandFailedError, errorMessage, excerpt } from './errors';
import type { HealthReport, HealthVerifier } from './health';
import * as log from './logger';
import type { ApplicationRecord, DeployMode } from './models';
import { fqdn, serviceName } from './models';
import { certbot } from './certbot';
import type { SourceFetcher } from './git';
import { certificateDir, nginx, renderSiteConfig, sitePaths } from './nginx';
import { createDatabaseSql, createRoleSql, databaseExists, psql, roleExists } from './postgres';
import type { RuntimeProfile } from './runtimes';
import { runtimeProfile } from './runtimes';
import { SecretDeployer } from './secret-deployer';
import type { SecretStore } from './secret-store';
import { secretValuesOnly } from './secret-store';
import type { RemoteShell } from './shell';
import { execOrThrow, readRemoteFile, runScript, shellQuote, writeRemoteFileAtomic } from './shell';
import { systemctl } from './systemctl';

export const DEPLOY_STEPS = [
  'ensure_directories',
  'provision_db_user',
  'fetch_source',
  'install_dependencies',
  'materialize_secrets',
  'create_database',
  'migrate_database',
  'build_assets',
  'write_proxy_config',
  'issue_certificate',
  'reload_proxy',
  'restart_service',
] as const;

export type DeployStepName = (typeof DEPLOY_STEPS)[number];

const ALL_MODES: readonly DeployMode[] = ['first_time', 'code_and_migrate', 'migrate_only'];
const WITH_CODE: readonly DeployMode[] = ['first_time', 'code_and_migrate'];
const FIRST_TIME: readonly DeployMode[] = ['first_time'];

const STEP_MODES: Record<DeployStepName, readonly DeployMode[]> = {
  ensure_directories: WITH_CODE,
  provision_db_user: FIRST_TIME,
  fetch_source: WITH_CODE,
  install_dependencies: ALL_MODES,
  materialize_secrets: ALL_MODES,
  create_database: FIRST_TIME,
  migrate_database: ALL_MODES,
  build_assets: WITH_CODE,
  write_proxy_config: WITH_CODE,
  issue_certificate: FIRST_TIME,
  reload_proxy: ALL_MODES,
  restart_service: ALL_MODES,
};

// Steps a run of `mode` executes, in execution order.
export function planSteps(mode: DeployMode): DeployStepName[] {
  return DEPLOY_STEPS.filter((name) => STEP_MODES[name].includes(mode));
}

export type StepStatus = 'succeeded' | 'failed' | 'skipped';

export interface StepResult {
  name: DeployStepName;
  status: StepStatus;
  detail: string;
  durationMs: number;
}

export interface FailedStep {
  stepName: DeployStepName;
  stderrExcerpt: string;
}

export interface DeploymentResult {
  appKey: string;
  mode: DeployMode;
  succeeded: boolean;
  steps: StepResult[];
  failedStep?: FailedStep;
  commit?: string;
  /** Present when the post-deploy health check ran. Never changes `succeeded`. */
  health?: HealthReport;
}

export type DeployEvent =
  | { type: 'step-start'; name: DeployStepName; index: number; total: number }
  | { type: 'step-end'; result: StepResult }
  | { type: 'output'; line: string };

export interface DeployOptions {
  /** Defaults to true. */
  runHealthCheck?: boolean;
  healthBaseUrl?: string;
  onEvent?: (event: DeployEvent) => void;
}

export interface DeploymentOrchestratorDeps {
  store: SecretStore;
  shell: RemoteShell;
  fetcher: SourceFetcher;
  layout: HostLayout;
  health?: HealthVerifier;
  commandTimeoutMs?: number;
  /** Identifies this run in the deploy lock. */
  lockHolder?: string;
}

interface StepOutcome {
  status: 'succeeded' | 'skipped';
  detail: string;
}

interface RunContext {
  app: ApplicationRecord;
  secrets: Record<string, string>;
  profile: RuntimeProfile;
  commit?: string;
  emit: (line: string) => void;
}

const REDACTED = '[REDACTED]';

// Replaces every secret value in `text`; longest first so overlapping values stay hidden.
export function redactSecrets(text: string, secrets: Record<string, string>): string {
  const values = Object.values(secrets)
    .filter((value) => value.length >= 4)
    .sort((a, b) => b.length - a.length);
  let redacted = text;
  for (const value of values) {
    redacted = redacted.split(value).join(REDACTED);
  }
  return redacted;
}

function done(detail: string): StepOutcome {
  return { status: 'succeeded', detail };
}

function skipped(detail: string): StepOutcome {
  return { status: 'skipped', detail };
}

/**
 * Runs the ordered deployment steps for one application against one host.
 * A failing step halts the run; completed steps are not rolled back.
 */
export class DeploymentOrchestrator {
  private readonly store: SecretStore;
  private readonly shell: RemoteShell;
  private readonly fetcher: SourceFetcher;
  private readonly layout: HostLayout;
  private readonly health?: HealthVerifier;
  private readonly timeoutMs?: number;
  private readonly lockHolder: string;
  private readonly secretDeployer: SecretDeployer;

  constructor(deps: DeploymentOrchestratorDeps) {
    this.store = deps.store;
    this.shell = deps.shell;
    this.fetcher = deps.fetcher;
    this.layout = deps.layout;
    this.health = deps.health;
    this.timeoutMs = deps.commandTimeoutMs;
    this.lockHolder = deps.lockHolder ?? `${os.hostname()}:${process.pid}`;
    this.secretDeployer = new SecretDeployer(deps.store, deps.shell, deps.layout);
  }

  async deploy(appKey: string, mode: DeployMode, options: DeployOptions = {}): Promise<DeploymentResult> {
    // resolve_application: unknown app or incomplete secrets fail here, before the host is touched.
    const app = this.store.getApp(appKey);
    const secrets = this.store.getDeploySecrets(appKey);
    const hidden = secretValuesOnly(secrets);

    // acquire_lock
    this.store.acquireDeployLock(appKey, this.lockHolder);

    const startedAt = new Date().toISOString();
    const transcript: string[] = [];
    const record = (line: string) => {
      const safe = redactSecrets(line, hidden);
      transcript.push(safe);
      return safe;
    };

    const ctx: RunContext = {
      app,
      secrets,
      profile: runtimeProfile(app.runtime),
      emit: (line) => {
        const safe = record(`    ${line}`);
        log.output(safe.trimStart());
        options.onEvent?.({ type: 'output', line: safe.trimStart() });
      },
    };

    const plan = planSteps(mode);
    const steps: StepResult[] = [];
    let failedStep: FailedStep | undefined;

    try {
      record(`Deploying ${appKey} (${mode}) to ${this.shell.target}`);

      for (const [i, name] of plan.entries()) {
        log.step(i + 1, plan.length, name);
        record(`▶ [${i + 1}/${plan.length}] ${name}`);
        options.onEvent?.({ type: 'step-start', name, index: i + 1, total: plan.length });

        const started = Date.now();
        let result: StepResult;
        try {
          const outcome = await this.runStep(name, ctx);
          result = { name, ...outcome, detail: redactSecrets(outcome.detail, hidden), durationMs: Date.now() - started };
        } catch (error) {
          const detail = redactSecrets(errorMessage(error), hidden);
          const stderr = error instanceof CommandFailedError ? excerpt(error.stderr || error.message) : detail;
          failedStep = { stepName: name, stderrExcerpt: redactSecrets(stderr, hidden) };
          result = { name, status: 'failed', detail, durationMs: Date.now() - started };
        }

        steps.push(result);
        record(`${result.status === 'failed' ? '✗' : result.status === 'skipped' ? '-' : '✓'} ${name}: ${result.detail}`);
        options.onEvent?.({ type: 'step-end', result });

        if (result.status === 'failed') {
          log.error(`${name} failed: ${result.detail}`);
          break;
        }
        if (result.status === 'skipped') {
          log.info(`  skipped: ${result.detail}`);
        } else {
          log.info(`  ${result.detail}`);
        }
      }
    } finally {
      this.store.releaseDeployLock(appKey, this.lockHolder);
    }

    const succeeded = failedStep === undefined;
    record(succeeded ? `Deployment of ${appKey} succeeded` : `Deployment of ${appKey} failed at ${failedStep?.stepName}`);

    this.store.recordDeployment({
      appKey,
      mode,
      status: succeeded ? 'succeeded' : 'failed',
      failedStep: failedStep?.stepName,
      log: transcript.join('\n'),
      startedAt,
      finishedAt: new Date().toISOString(),
    });

    const result: DeploymentResult = { appKey, mode, succeeded, steps, failedStep, commit: ctx.commit };

    if (succeeded && this.health && options.runHealthCheck !== false) {
      result.health = await this.health.healthCheck(appKey, { baseUrl: options.healthBaseUrl });
    }

    return result;
  }

  private async runStep(name: DeployStepName, ctx: RunContext): Promise<StepOutcome> {
    switch (name) {
      case 'ensure_directories':
        return this.ensureDirectories(ctx);
      case 'provision_db_user':
        return this.provisionDbUser(ctx);
      case 'fetch_source':
        return this.fetchSource(ctx);
      case 'install_dependencies':
        return this.installDependencies(ctx);
      case 'materialize_secrets':
        return this.materializeSecrets(ctx);
      case 'create_database':
        return this.createDatabase(ctx);
      case 'migrate_database':
        return this.migrateDatabase(ctx);
      case 'build_assets':
        return this.buildAssets(ctx);
      case 'write_proxy_config':
        return this.writeProxyConfig(ctx);
      case 'issue_certificate':
        return this.issueCertificate(ctx);
      case 'reload_proxy':
        return this.reloadProxy();
      case 'restart_service':
        return this.restartService(ctx);
    }
  }

  private async ensureDirectories({ app }: RunContext): Promise<StepOutcome> {
    const backupDir = `${this.layout.backupRoot}/${app.appKey}`;
    const dirs = [app.deployPath, backupDir].map(shellQuote).join(' ');
    const user = this.layout.deployUser;

    let command = `mkdir -p ${dirs} ${shellQuote(this.layout.acmeWebroot)}`;
    if (user) {
      command += ` && chown ${shellQuote(user)}: ${dirs}`;
    }
    await execOrThrow(this.shell, command, { timeoutMs: this.timeoutMs });
    return done(`${app.deployPath} and ${backupDir} ready`);
  }

  private async provisionDbUser({ secrets }: RunContext): Promise<StepOutcome> {
    const role = secrets.DATABASE_USERNAME;
    if (await roleExists(this.shell, role, this.timeoutMs)) {
      return done(`role ${role} already exists`);
    }
    await psql(this.shell, createRoleSql(role, secrets.DATABASE_PASSWORD), `psql: create role ${role}`, this.timeoutMs);
    return done(`created role ${role}`);
  }

  private async fetchSource(ctx: RunContext): Promise<StepOutcome> {
    const { app } = ctx;
    const result = await this.fetcher.fetch(app, {
      user: this.layout.deployUser,
      timeoutMs: this.timeoutMs,
      onLine: ctx.emit,
    });
    ctx.commit = result.commit;
    return done(`${result.cloned ? 'cloned' : 'updated'} ${app.branch} at ${result.commit}`);
  }

  private async installDependencies(ctx: RunContext): Promise<StepOutcome> {
    await this.runInApp(ctx, ctx.profile.install, 'install dependencies', ctx.profile.baseEnv);
    return done('production dependencies installed');
  }

  private async materializeSecrets({ app, secrets }: RunContext): Promise<StepOutcome> {
    const result = await this.secretDeployer.deployResolved(app, secrets, { restart: false, timeoutMs: this.timeoutMs });
    const state = result.created ? 'created' : result.changed ? 'updated' : 'unchanged';
    return done(`${result.variableCount} variables in ${result.unitPath} (${state})`);
  }

  private async createDatabase(ctx: RunContext): Promise<StepOutcome> {
    const database = ctx.secrets.DATABASE_NAME;
    if (await databaseExists(this.shell, database, this.timeoutMs)) {
      return done(`database ${database} already exists`);
    }
    if (ctx.profile.createDatabase) {
      await this.runInApp(ctx, ctx.profile.createDatabase, 'create database');
    } else {
      await psql(
        this.shell,
        createDatabaseSql(database, ctx.secrets.DATABASE_USERNAME),
        `psql: create database ${database}`,
        this.timeoutMs,
      );
    }
    return done(`created database ${database}`);
  }

  private async migrateDatabase(ctx: RunContext): Promise<StepOutcome> {
    const result = await this.runInApp(ctx, ctx.profile.migrate, 'migrate database');
    // alembic reports on stderr, rails on stdout
    const applied = ctx.profile.countMigrations(`${result.stdout}\n${result.stderr}`);
    return done(`${applied} migrations applied`);
  }

  private async buildAssets(ctx: RunContext): Promise<StepOutcome> {
    if (!ctx.profile.assets) {
      return skipped(`no asset step for ${ctx.profile.runtime}`);
    }
    await this.runInApp(ctx, ctx.profile.assets, 'build assets');
    return done('assets precompiled');
  }

  private async writeProxyConfig({ app }: RunContext): Promise<StepOutcome> {
    const certDir = certificateDir(this.layout.letsencryptDir, app);
    const tls = (await this.shell.exec(certbot.exists(certDir), { timeoutMs: this.timeoutMs })).exitCode === 0;
    const changed = await this.writeSite(app, tls);
    return done(`${fqdn(app)} -> 127.0.0.1:${app.port} (${tls ? 'https' : 'http only'}${changed ? '' : ', unchanged'})`);
  }

  private async issueCertificate({ app }: RunContext): Promise<StepOutcome> {
    const host = fqdn(app);
    const certDir = certificateDir(this.layout.letsencryptDir, app);
    if ((await this.shell.exec(certbot.exists(certDir), { timeoutMs: this.timeoutMs })).exitCode === 0) {
      return done(`certificate for ${host} already present`);
    }

    // The ACME challenge is answered by the port 80 block written in the previous step.
    await execOrThrow(this.shell, nginx.reload(), { timeoutMs: this.timeoutMs });
    await execOrThrow(
      this.shell,
      certbot.issue(host, { webroot: this.layout.acmeWebroot, email: this.layout.certbotEmail }),
      { label: `certbot certonly ${host}`, timeoutMs: this.timeoutMs },
    );
    await this.writeSite(app, true);
    return done(`issued certificate for ${host}`);
  }

  private async reloadProxy(): Promise<StepOutcome> {
    await execOrThrow(this.shell, nginx.reload(), { timeoutMs: this.timeoutMs });
    return done('nginx reloaded');
  }

  private async restartService({ app }: RunContext): Promise<StepOutcome> {
    const unit = serviceName(app);
    await execOrThrow(this.shell, systemctl.restart(unit), { timeoutMs: this.timeoutMs });
    return done(`${unit} restarted`);
  }

  // Writes the site config when it changed, links it and validates nginx.
  private async writeSite(app: ApplicationRecord, tls: boolean): Promise<boolean> {
    const paths = sitePaths(this.layout.nginxDir, app);
    const config = renderSiteConfig(app, { tls, layout: this.layout });

    const current = await readRemoteFile(this.shell, paths.available);
    const changed = current !== config;
    if (changed) {
      await writeRemoteFileAtomic(this.shell, paths.available, config);
    }
    await execOrThrow(this.shell, nginx.enableSite(paths.available, paths.enabled), { timeoutMs: this.timeoutMs });
    await execOrThrow(this.shell, nginx.test(), { timeoutMs: this.timeoutMs });
    return changed;
  }

  // Runs a runtime command inside the checkout with the app's environment exported over stdin.
  private runInApp(ctx: RunContext, command: string, label: string, env?: Record<string, string>) {
    return runScript(this.shell, `cd ${shellQuote(ctx.app.deployPath)}\n${command}`, {
      label: `${ctx.app.appKey}: ${label}`,
      env: env ?? { ...ctx.profile.baseEnv, PORT: String(ctx.app.port), ...ctx.secrets },
      user: this.layout.deployUser,
      timeoutMs: this.timeoutMs,
      onLine: (line) => ctx.emit(line),
    });
  }
}

import type { HostLayout } from './config';
import { errorMessage } from './errors';
import type { ApplicationRecord } from './models';
import { fqdn, serviceName } from './models';
import { runtimeProfile } from './runtimes';
import type { SecretStore } from './secret-store';
import type { RemoteShell } from './shell';
import { runScript, shellQuote } from './shell';
import { systemctl } from './systemctl';

export const HEALTH_CHECKS = [
  'service_active',
  'http_reachable',
  'auth_enforced',
  'db_connected',
  'api_contract',
] as const;

export type HealthCheckName = (typeof HEALTH_CHECKS)[number];

export type CheckStatus = 'pass' | 'fail' | 'skipped';

export interface HealthCheckResult {
  name: HealthCheckName;
  status: CheckStatus;
  detail: string;
}

export interface HealthReport {
  appKey: string;
  baseUrl: string;
  checkedAt: string;
  healthy: boolean;
  /** Always all five checks, in HEALTH_CHECKS order. */
  checks: HealthCheckResult[];
  errors: string[];
}

export interface HealthCheckOptions {
  /** Overrides https://<fqdn>. */
  baseUrl?: string;
}

export interface HealthVerifierOptions {
  layout: Pick<HostLayout, 'deployUser'>;
  httpTimeoutMs: number;
  commandTimeoutMs?: number;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export function isCheckPassing(report: HealthReport, name: HealthCheckName): boolean {
  return report.checks.find((check) => check.name === name)?.status === 'pass';
}

/**
 * Probes a deployed application from the outside. Every check runs on every
 * call; a failing check never stops the others.
 */
export class HealthVerifier {
  constructor(
    private readonly store: SecretStore,
    private readonly shell: RemoteShell,
    private readonly options: HealthVerifierOptions,
  ) {}

  async healthCheck(appKey: string, options: HealthCheckOptions = {}): Promise<HealthReport> {
    const app = this.store.getApp(appKey);
    const baseUrl = (options.baseUrl ?? `https://${fqdn(app)}`).replace(/\/+$/, '');

    const checks: HealthCheckResult[] = [];
    for (const name of HEALTH_CHECKS) {
      checks.push(await this.runCheck(name, app, baseUrl));
    }

    const errors = checks
      .filter((check) => check.status === 'fail')
      .map((check) => `${check.name}: ${check.detail}`);

    return {
      appKey,
      baseUrl,
      checkedAt: new Date().toISOString(),
      healthy: errors.length === 0,
      checks,
      errors,
    };
  }

  private async runCheck(name: HealthCheckName, app: ApplicationRecord, baseUrl: string): Promise<HealthCheckResult> {
    try {
      switch (name) {
        case 'service_active':
          return await this.checkService(app);
        case 'http_reachable':
          return await this.checkReachable(app, baseUrl);
        case 'auth_enforced':
          return await this.checkAuth(app, baseUrl);
        case 'db_connected':
          return await this.checkDatabase(app);
        case 'api_contract':
          return await this.checkApi(app, baseUrl);
      }
    } catch (error) {
      return { name, status: 'fail', detail: errorMessage(error) };
    }
  }

  private async checkService(app: ApplicationRecord): Promise<HealthCheckResult> {
    const unit = serviceName(app);
    const result = await this.shell.exec(systemctl.isActive(unit), { timeoutMs: this.options.commandTimeoutMs });
    const state = result.stdout.trim() || result.stderr.trim() || `exit ${result.exitCode}`;
    return state === 'active'
      ? { name: 'service_active', status: 'pass', detail: `${unit} is active` }
      : { name: 'service_active', status: 'fail', detail: `${unit} is ${state}` };
  }

  private async checkReachable(app: ApplicationRecord, baseUrl: string): Promise<HealthCheckResult> {
    const url = `${baseUrl}${app.healthPath}`;
    const response = await this.get(url);
    return response.status === 200 || response.status === 302
      ? { name: 'http_reachable', status: 'pass', detail: `GET ${app.healthPath} -> ${response.status}` }
      : { name: 'http_reachable', status: 'fail', detail: `GET ${app.healthPath} -> ${response.status}, expected 200 or 302` };
  }

  private async checkAuth(app: ApplicationRecord, baseUrl: string): Promise<HealthCheckResult> {
    const response = await this.get(`${baseUrl}${app.protectedPath}`);
    const location = response.headers.get('location') ?? '';

    if (REDIRECT_STATUSES.has(response.status) && location.includes(app.loginPath)) {
      return { name: 'auth_enforced', status: 'pass', detail: `GET ${app.protectedPath} -> ${response.status} ${location}` };
    }
    if (response.status === 200) {
      return {
        name: 'auth_enforced',
        status: 'fail',
        detail: `SECURITY: ${app.protectedPath} answered 200 without credentials`,
      };
    }
    return {
      name: 'auth_enforced',
      status: 'fail',
      detail: `GET ${app.protectedPath} -> ${response.status}${location ? ` ${location}` : ''}, expected a redirect to ${app.loginPath}`,
    };
  }

  private async checkDatabase(app: ApplicationRecord): Promise<HealthCheckResult> {
    const profile = runtimeProfile(app.runtime);
    const secrets = this.store.getDeploySecrets(app.appKey);
    const result = await runScript(this.shell, `cd ${shellQuote(app.deployPath)}\n${profile.dbCheck}`, {
      label: `${app.appKey}: database check`,
      // Same environment the service unit runs with.
      env: { ...profile.baseEnv, PORT: String(app.port), ...secrets },
      user: this.options.layout.deployUser,
      timeoutMs: this.options.commandTimeoutMs,
    });
    return /^db:ok$/m.test(result.stdout)
      ? { name: 'db_connected', status: 'pass', detail: 'SELECT 1 through the application runtime succeeded' }
      : { name: 'db_connected', status: 'fail', detail: 'database check printed no confirmation' };
  }

  private async checkApi(app: ApplicationRecord, baseUrl: string): Promise<HealthCheckResult> {
    if (!app.apiPath || !app.apiResourceKey) {
      return { name: 'api_contract', status: 'skipped', detail: 'no token API for this application' };
    }

    const token = this.store.getDeploySecrets(app.appKey).API_TOKEN;
    if (!token) {
      return { name: 'api_contract', status: 'fail', detail: 'api_token is not set for this application' };
    }

    const inPath = app.apiPath.includes('{token}');
    const apiPath = inPath ? app.apiPath.replace('{token}', encodeURIComponent(token)) : app.apiPath;
    const shownPath = inPath ? app.apiPath.replace('{token}', '<token>') : app.apiPath;
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (!inPath) headers.Authorization = `Bearer ${token}`;

    const response = await this.get(`${baseUrl}${apiPath}`, headers);
    if (response.status !== 200) {
      return { name: 'api_contract', status: 'fail', detail: `GET ${shownPath} -> ${response.status}, expected 200` };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      return { name: 'api_contract', status: 'fail', detail: `GET ${shownPath} did not return JSON` };
    }

    if (typeof body !== 'object' || body === null || Array.isArray(body) || !(app.apiResourceKey in body)) {
      return {
        name: 'api_contract',
        status: 'fail',
        detail: `GET ${shownPath} returned JSON without top-level "${app.apiResourceKey}"`,
      };
    }
    return { name: 'api_contract', status: 'pass', detail: `GET ${shownPath} -> 200 with "${app.apiResourceKey}"` };
  }

  // Redirects are part of what is being checked, so they are never followed.
  private get(url: string, headers: Record<string, string> = {}): Promise<Response> {
    return fetch(url, {
      method: 'GET',
      redirect: 'manual',
      headers,
      signal: AbortSignal.timeout(this.options.httpTimeoutMs),
    });
  }
}

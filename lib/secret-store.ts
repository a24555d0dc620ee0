import bcrypt from 'bcryptjs';
import { randomBytes } from 'crypto';
import { z } from 'zod';
import type { Db, DbHelpers, SecretColumn } from './db';
import { createDbHelpers } from './db';
import {
  DeploymentLockedError,
  IncompleteSecretError,
  InvalidInputError,
  NotFoundError,
  SecretReuseError,
} from './errors';
import type { AppRow, ApplicationRecord, DeploymentRow, DeployLockRow, NewDeployment } from './models';
import { toApplicationRecord } from './models';

export const HMS_APP_KEY = 'hms';

const SECRET_COLUMNS: readonly SecretColumn[] = ['database_password', 'secret_key_base', 'api_token'];

const API_KEY_NAME_RE = /^[A-Z][A-Z0-9_]*$/;

// Names the store itself renders; a third-party key may not shadow them.
const RESERVED_ENV_NAMES = new Set(['DATABASE_NAME', 'DATABASE_USERNAME', 'DATABASE_PASSWORD', 'SECRET_KEY_BASE', 'API_TOKEN', 'PORT', 'RAILS_ENV']);

// Connection settings rendered beside the secrets; they name things, they are not secret.
const PLAIN_ENV_NAMES = new Set(['DATABASE_NAME', 'DATABASE_USERNAME', 'DATABASE_HOST', 'DATABASE_PORT', 'HMS_ADMIN_USERNAME']);

// The subset of a deploy environment whose values must never be logged.
export function secretValuesOnly(env: Record<string, string>): Record<string, string> {
  return Object.fromEntries(Object.entries(env).filter(([name]) => !PLAIN_ENV_NAMES.has(name)));
}

export const HMS_CONFIG_KEYS = [
  'admin_username',
  'admin_password_hash',
  'jwt_secret',
  'db_host',
  'db_port',
  'db_name',
  'db_user',
  'db_password',
] as const;

export type HmsConfigKey = (typeof HMS_CONFIG_KEYS)[number];

// hms_config key -> environment variable of the HMS service
const HMS_ENV_NAMES: Record<HmsConfigKey, string> = {
  admin_username: 'HMS_ADMIN_USERNAME',
  admin_password_hash: 'HMS_ADMIN_PASSWORD_HASH',
  jwt_secret: 'JWT_SECRET_KEY',
  db_host: 'DATABASE_HOST',
  db_port: 'DATABASE_PORT',
  db_name: 'DATABASE_NAME',
  db_user: 'DATABASE_USERNAME',
  db_password: 'DATABASE_PASSWORD',
};

const REQUIRED_HMS_KEYS: readonly HmsConfigKey[] = [
  'admin_username',
  'admin_password_hash',
  'jwt_secret',
  'db_name',
  'db_user',
  'db_password',
];

const sqlIdentifier = z.string().regex(/^[a-z_][a-z0-9_]*$/, 'must be a lowercase SQL identifier');
const urlPath = z.string().startsWith('/');

export const newAppSchema = z.object({
  appKey: z.string().regex(/^[a-z][a-z0-9_-]*$/, 'must be lowercase letters, digits, - or _'),
  runtime: z.enum(['rails', 'fastapi']).default('rails'),
  domain: z.string().min(1),
  subdomain: z.string().min(1).nullable().default(null),
  sourceRepository: z.string().min(1),
  branch: z.string().min(1).default('main'),
  deployPath: z.string().startsWith('/').refine((value) => value.replace(/\/+$/, '') !== '', 'must not be /'),
  databaseName: sqlIdentifier,
  databaseUsername: sqlIdentifier,
  databasePassword: z.string().min(1).nullable().default(null),
  secretKeyBase: z.string().min(1).nullable().default(null),
  apiToken: z.string().min(1).nullable().default(null),
  port: z.coerce.number().int().min(1024).max(65535),
  healthPath: urlPath.default('/up'),
  loginPath: urlPath.default('/users/sign_in'),
  protectedPath: urlPath.default('/dashboard'),
  apiPath: urlPath.nullable().default(null),
  apiResourceKey: z.string().min(1).nullable().default(null),
});

export type NewAppInput = z.input<typeof newAppSchema>;

export type SecretField = SecretColumn | string;

/**
 * Access to the apps / app_api_keys / hms_config tables. The only place in the
 * tool that reads secret columns; callers get plain name -> value maps.
 */
export class SecretStore {
  private readonly helpers: DbHelpers;

  constructor(private readonly db: Db) {
    this.helpers = createDbHelpers(db);
  }

  createApp(input: NewAppInput): ApplicationRecord {
    const parsed = newAppSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidInputError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '));
    }
    const app = parsed.data;
    if (app.apiPath && !app.apiResourceKey) {
      throw new InvalidInputError('apiResourceKey is required when apiPath is set');
    }
    const deployPath = app.deployPath.replace(/\/+$/, '');

    const create = this.db.transaction(() => {
      if (this.helpers.getAppByKey(app.appKey)) {
        throw new InvalidInputError(`App with key '${app.appKey}' already exists`);
      }
      this.assertIsolated(app.appKey, {
        databaseName: app.databaseName,
        databaseUsername: app.databaseUsername,
        deployPath,
        port: app.port,
      });
      for (const [field, value] of [
        ['database_password', app.databasePassword],
        ['secret_key_base', app.secretKeyBase],
        ['api_token', app.apiToken],
      ] as const) {
        if (value) this.assertNotReused(app.appKey, field, value);
      }

      this.helpers.createApp({
        app_key: app.appKey,
        runtime: app.runtime,
        domain: app.domain,
        subdomain: app.subdomain,
        source_repository: app.sourceRepository,
        branch: app.branch,
        deploy_path: deployPath,
        database_name: app.databaseName,
        database_username: app.databaseUsername,
        database_password: app.databasePassword,
        secret_key_base: app.secretKeyBase,
        api_token: app.apiToken,
        port: app.port,
        health_path: app.healthPath,
        login_path: app.loginPath,
        protected_path: app.protectedPath,
        api_path: app.apiPath,
        api_resource_key: app.apiResourceKey,
      });
    });
    create();

    return this.getApp(app.appKey);
  }

  listApps(): ApplicationRecord[] {
    return this.helpers.getAllApps().map(toApplicationRecord);
  }

  // Enabled application record, secrets stripped.
  getApp(appKey: string): ApplicationRecord {
    return toApplicationRecord(this.getEnabledRow(appKey));
  }

  setAppEnabled(appKey: string, enabled: boolean): void {
    if (!this.helpers.getAppByKey(appKey)) {
      throw new NotFoundError(`App ${appKey} not found`);
    }
    this.helpers.setAppEnabled(appKey, enabled);
  }

  getAppSecrets(appKey: string): Record<string, string> {
    const row = this.getEnabledRow(appKey);

    const missing: string[] = [];
    if (!row.database_password) missing.push('database_password');
    if (!row.secret_key_base) missing.push('secret_key_base');
    if (missing.length > 0) {
      throw new IncompleteSecretError(appKey, missing);
    }

    const secrets: Record<string, string> = {
      DATABASE_NAME: row.database_name,
      DATABASE_USERNAME: row.database_username,
      DATABASE_PASSWORD: row.database_password ?? '',
      SECRET_KEY_BASE: row.secret_key_base ?? '',
    };
    if (row.api_token) {
      secrets.API_TOKEN = row.api_token;
    }
    for (const key of this.helpers.getAppApiKeys(appKey)) {
      secrets[key.name] = key.value;
    }
    return secrets;
  }

  getHmsSecrets(): Record<string, string> {
    const config = new Map(this.helpers.getHmsConfig().map((row) => [row.key, row.value]));

    const missing = REQUIRED_HMS_KEYS.filter((key) => !config.get(key));
    if (missing.length > 0) {
      throw new IncompleteSecretError('hms_config', missing);
    }

    const secrets: Record<string, string> = {
      DATABASE_HOST: config.get('db_host') || 'localhost',
      DATABASE_PORT: config.get('db_port') || '5432',
    };
    for (const key of HMS_CONFIG_KEYS) {
      const value = config.get(key);
      if (value) secrets[HMS_ENV_NAMES[key]] = value;
    }
    return secrets;
  }

  // Secrets the deployed process of `appKey` runs with.
  getDeploySecrets(appKey: string): Record<string, string> {
    if (appKey === HMS_APP_KEY) {
      this.getEnabledRow(appKey);
      return this.getHmsSecrets();
    }
    return this.getAppSecrets(appKey);
  }

  /**
   * Sets exactly one secret field in a single transaction. `field` is a secret
   * column or the environment name of a third-party key.
   */
  updateAppSecret(appKey: string, field: SecretField, value: string): void {
    if (!value) {
      throw new InvalidInputError(`Value for ${field} must not be empty`);
    }
    const column = SECRET_COLUMNS.find((candidate) => candidate === field);
    if (!column && !API_KEY_NAME_RE.test(field)) {
      throw new InvalidInputError(
        `Unknown secret field '${field}': expected ${SECRET_COLUMNS.join(', ')} or an UPPER_CASE API key name`,
      );
    }
    if (!column && RESERVED_ENV_NAMES.has(field)) {
      throw new InvalidInputError(`${field} is managed by the store; set the matching column instead`);
    }

    const update = this.db.transaction(() => {
      this.getEnabledRow(appKey);
      this.assertNotReused(appKey, field, value);
      if (column) {
        this.helpers.setAppSecretColumn(appKey, column, value);
      } else {
        this.helpers.setAppApiKey(appKey, field, value);
      }
    });
    update();
  }

  rotateAppSecret(appKey: string, field: SecretField): void {
    this.updateAppSecret(appKey, field, generateSecret(field));
  }

  setHmsConfig(key: HmsConfigKey, value: string): void {
    if (!value) {
      throw new InvalidInputError(`Value for ${key} must not be empty`);
    }
    this.helpers.setHmsConfig(key, value);
  }

  setHmsAdmin(username: string, password: string): void {
    if (password.length < 12) {
      throw new InvalidInputError('Admin password must be at least 12 characters');
    }
    const hash = bcrypt.hashSync(password, 12);
    this.db.transaction(() => {
      this.helpers.setHmsConfig('admin_username', username);
      this.helpers.setHmsConfig('admin_password_hash', hash);
    })();
  }

  verifyHmsAdmin(username: string, password: string): boolean {
    const config = new Map(this.helpers.getHmsConfig().map((row) => [row.key, row.value]));
    const expectedUser = config.get('admin_username');
    const hash = config.get('admin_password_hash');
    if (!expectedUser || !hash || expectedUser !== username) return false;
    return bcrypt.compareSync(password, hash);
  }

  acquireDeployLock(appKey: string, holder: string): void {
    const result = this.helpers.insertDeployLock(appKey, holder, new Date().toISOString());
    if (result.changes === 0) {
      const existing = this.helpers.getDeployLock(appKey);
      throw new DeploymentLockedError(appKey, existing?.holder ?? 'unknown', existing?.acquired_at ?? 'unknown');
    }
  }

  releaseDeployLock(appKey: string, holder: string): void {
    this.helpers.deleteDeployLock(appKey, holder);
  }

  forceReleaseDeployLock(appKey: string): DeployLockRow | undefined {
    const existing = this.helpers.getDeployLock(appKey);
    this.helpers.forceDeleteDeployLock(appKey);
    return existing;
  }

  recordDeployment(deployment: NewDeployment): void {
    this.helpers.createDeployment({
      app_key: deployment.appKey,
      mode: deployment.mode,
      status: deployment.status,
      failed_step: deployment.failedStep ?? null,
      log: deployment.log,
      started_at: deployment.startedAt,
      finished_at: deployment.finishedAt,
    });
  }

  listDeployments(appKey: string, limit: number = 10): DeploymentRow[] {
    return this.helpers.getAppDeployments(appKey, limit);
  }

  private getEnabledRow(appKey: string): AppRow {
    const row = this.helpers.getAppByKey(appKey);
    if (!row || row.enabled !== 1) {
      throw new NotFoundError(`App ${appKey} not found or disabled`);
    }
    return row;
  }

  // Each app gets its own role, database, port and directory tree.
  private assertIsolated(
    appKey: string,
    app: { databaseName: string; databaseUsername: string; deployPath: string; port: number },
  ): void {
    for (const row of this.helpers.getAllApps()) {
      if (row.app_key === appKey) continue;
      if (row.database_name === app.databaseName) {
        throw new InvalidInputError(`Database ${app.databaseName} is already used by ${row.app_key}`);
      }
      if (row.database_username === app.databaseUsername) {
        throw new InvalidInputError(`Database role ${app.databaseUsername} is already used by ${row.app_key}`);
      }
      if (row.port === app.port) {
        throw new InvalidInputError(`Port ${app.port} is already used by ${row.app_key}`);
      }
      if (pathsOverlap(row.deploy_path, app.deployPath)) {
        throw new InvalidInputError(`Deploy path ${app.deployPath} overlaps ${row.deploy_path} of ${row.app_key}`);
      }
    }
  }

  private assertNotReused(appKey: string, field: string, value: string): void {
    for (const row of this.helpers.getAllApps()) {
      if (row.app_key === appKey) continue;
      if (SECRET_COLUMNS.some((column) => row[column] === value)) {
        throw new SecretReuseError(appKey, field, row.app_key);
      }
    }
    for (const key of this.helpers.getAllApiKeys()) {
      if (key.app_key !== appKey && key.value === value) {
        throw new SecretReuseError(appKey, field, key.app_key);
      }
    }
  }
}

function pathsOverlap(a: string, b: string): boolean {
  return a === b || a.startsWith(`${b}/`) || b.startsWith(`${a}/`);
}

export function generateSecret(field: SecretField): string {
  if (field === 'secret_key_base') {
    return randomBytes(64).toString('hex');
  }
  return randomBytes(32).toString('base64url');
}

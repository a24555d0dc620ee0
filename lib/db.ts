import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import type {
  AppApiKeyRow,
  AppRow,
  AppRuntime,
  DeployLockRow,
  DeploymentRow,
  DeploymentStatus,
  DeployMode,
  HmsConfigRow,
} from './models';

export type Db = Database.Database;

// Open (or create) the secret store and make sure the schema exists.
export function openDatabase(dbPath: string): Db {
  if (dbPath !== ':memory:') {
    mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  db.pragma('foreign_keys = ON');
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS apps (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      app_key TEXT UNIQUE NOT NULL,
      runtime TEXT NOT NULL DEFAULT 'rails' CHECK (runtime IN ('rails', 'fastapi')),
      domain TEXT NOT NULL,
      subdomain TEXT,
      source_repository TEXT NOT NULL,
      branch TEXT NOT NULL DEFAULT 'main',
      deploy_path TEXT UNIQUE NOT NULL,
      database_name TEXT UNIQUE NOT NULL,
      database_username TEXT UNIQUE NOT NULL,
      database_password TEXT,
      secret_key_base TEXT,
      api_token TEXT,
      port INTEGER UNIQUE NOT NULL,
      enabled INTEGER NOT NULL DEFAULT 1,
      health_path TEXT NOT NULL DEFAULT '/up',
      login_path TEXT NOT NULL DEFAULT '/users/sign_in',
      protected_path TEXT NOT NULL DEFAULT '/dashboard',
      api_path TEXT,
      api_resource_key TEXT,
      created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
      updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS app_api_keys (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      app_key TEXT NOT NULL,
      name TEXT NOT NULL,
      value TEXT NOT NULL,
      created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY (app_key) REFERENCES apps (app_key),
      UNIQUE(app_key, name)
    );

    CREATE TABLE IF NOT EXISTS hms_config (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS deploy_locks (
      app_key TEXT PRIMARY KEY,
      holder TEXT NOT NULL,
      acquired_at DATETIME NOT NULL
    );

    CREATE TABLE IF NOT EXISTS deployments (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      app_key TEXT NOT NULL,
      mode TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('succeeded', 'failed')),
      failed_step TEXT,
      log TEXT NOT NULL DEFAULT '',
      started_at DATETIME NOT NULL,
      finished_at DATETIME NOT NULL
    );
  `);

  return db;
}

export interface NewAppRow {
  app_key: string;
  runtime: AppRuntime;
  domain: string;
  subdomain: string | null;
  source_repository: string;
  branch: string;
  deploy_path: string;
  database_name: string;
  database_username: string;
  database_password: string | null;
  secret_key_base: string | null;
  api_token: string | null;
  port: number;
  health_path: string;
  login_path: string;
  protected_path: string;
  api_path: string | null;
  api_resource_key: string | null;
}

export type SecretColumn = 'database_password' | 'secret_key_base' | 'api_token';

export interface NewDeploymentRow {
  app_key: string;
  mode: DeployMode;
  status: DeploymentStatus;
  failed_step: string | null;
  log: string;
  started_at: string;
  finished_at: string;
}

// Helper functions for database operations
export function createDbHelpers(db: Db) {
  return {
    // Apps
    getAllApps: () =>
      db.prepare<[], AppRow>('SELECT * FROM apps ORDER BY app_key').all(),

    getAppByKey: (appKey: string) =>
      db.prepare<[string], AppRow>('SELECT * FROM apps WHERE app_key = ?').get(appKey),

    createApp: (app: NewAppRow) =>
      db.prepare<[NewAppRow]>(`
        INSERT INTO apps (
          app_key, runtime, domain, subdomain, source_repository, branch, deploy_path,
          database_name, database_username, database_password, secret_key_base, api_token,
          port, health_path, login_path, protected_path, api_path, api_resource_key
        ) VALUES (
          @app_key, @runtime, @domain, @subdomain, @source_repository, @branch, @deploy_path,
          @database_name, @database_username, @database_password, @secret_key_base, @api_token,
          @port, @health_path, @login_path, @protected_path, @api_path, @api_resource_key
        )
      `).run(app),

    setAppEnabled: (appKey: string, enabled: boolean) =>
      db.prepare<[number, string]>('UPDATE apps SET enabled = ?, updated_at = CURRENT_TIMESTAMP WHERE app_key = ?')
        .run(enabled ? 1 : 0, appKey),

    // Column names come from the SecretColumn union, never from input.
    setAppSecretColumn: (appKey: string, column: SecretColumn, value: string) =>
      db.prepare<[string, string]>(`UPDATE apps SET ${column} = ?, updated_at = CURRENT_TIMESTAMP WHERE app_key = ?`)
        .run(value, appKey),

    // Third-party API keys
    getAppApiKeys: (appKey: string) =>
      db.prepare<[string], AppApiKeyRow>('SELECT app_key, name, value FROM app_api_keys WHERE app_key = ? ORDER BY name').all(appKey),

    getAllApiKeys: () =>
      db.prepare<[], AppApiKeyRow>('SELECT app_key, name, value FROM app_api_keys').all(),

    setAppApiKey: (appKey: string, name: string, value: string) =>
      db.prepare<[string, string, string]>(`
        INSERT INTO app_api_keys (app_key, name, value) VALUES (?, ?, ?)
        ON CONFLICT (app_key, name) DO UPDATE SET value = excluded.value
      `).run(appKey, name, value),

    // HMS configuration
    getHmsConfig: () =>
      db.prepare<[], HmsConfigRow>('SELECT * FROM hms_config ORDER BY key').all(),

    setHmsConfig: (key: string, value: string) =>
      db.prepare<[string, string]>(`
        INSERT INTO hms_config (key, value) VALUES (?, ?)
        ON CONFLICT (key) DO UPDATE SET value = excluded.value, updated_at = CURRENT_TIMESTAMP
      `).run(key, value),

    // Deploy locks
    getDeployLock: (appKey: string) =>
      db.prepare<[string], DeployLockRow>('SELECT * FROM deploy_locks WHERE app_key = ?').get(appKey),

    insertDeployLock: (appKey: string, holder: string, acquiredAt: string) =>
      db.prepare<[string, string, string]>('INSERT OR IGNORE INTO deploy_locks (app_key, holder, acquired_at) VALUES (?, ?, ?)')
        .run(appKey, holder, acquiredAt),

    deleteDeployLock: (appKey: string, holder: string) =>
      db.prepare<[string, string]>('DELETE FROM deploy_locks WHERE app_key = ? AND holder = ?').run(appKey, holder),

    forceDeleteDeployLock: (appKey: string) =>
      db.prepare<[string]>('DELETE FROM deploy_locks WHERE app_key = ?').run(appKey),

    // Deployments
    createDeployment: (deployment: NewDeploymentRow) =>
      db.prepare<[NewDeploymentRow]>(`
        INSERT INTO deployments (app_key, mode, status, failed_step, log, started_at, finished_at)
        VALUES (@app_key, @mode, @status, @failed_step, @log, @started_at, @finished_at)
      `).run(deployment),

    getAppDeployments: (appKey: string, limit: number = 10) =>
      db.prepare<[string, number], DeploymentRow>('SELECT * FROM deployments WHERE app_key = ? ORDER BY id DESC LIMIT ?')
        .all(appKey, limit),
  };
}

export type DbHelpers = ReturnType<typeof createDbHelpers>;

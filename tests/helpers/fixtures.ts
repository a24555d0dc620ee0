import type { HostLayout } from "../../lib/config";
import { openDatabase } from "../../lib/db";
import type { Db } from "../../lib/db";
import type { ApplicationRecord } from "../../lib/models";
import { SecretStore } from "../../lib/secret-store";
import type { NewAppInput } from "../../lib/secret-store";

export const layout: HostLayout = {
  systemdDir: "/etc/systemd/system",
  nginxDir: "/etc/nginx",
  letsencryptDir: "/etc/letsencrypt",
  acmeWebroot: "/var/www/certbot",
  backupRoot: "/var/backups/hms",
  deployUser: "deploy",
};

export function createTestStore(): { db: Db; store: SecretStore } {
  const db = openDatabase(":memory:");
  return { db, store: new SecretStore(db) };
}

export function railsApp(overrides: Partial<NewAppInput> = {}): NewAppInput {
  return {
    appKey: "humidor",
    runtime: "rails",
    domain: "example.test",
    subdomain: "humidor",
    sourceRepository: "https://github.com/example/humidor",
    branch: "main",
    deployPath: "/srv/humidor",
    databaseName: "humidor_production",
    databaseUsername: "humidor",
    databasePassword: "test-db-password-humidor",
    secretKeyBase: "test-secret-key-base-humidor",
    port: 3001,
    ...overrides,
  };
}

export function fastapiApp(overrides: Partial<NewAppInput> = {}): NewAppInput {
  return {
    appKey: "tasks",
    runtime: "fastapi",
    domain: "example.test",
    subdomain: "tasks",
    sourceRepository: "git@github.com:example/tasks.git",
    branch: "main",
    deployPath: "/srv/tasks",
    databaseName: "tasks_production",
    databaseUsername: "tasks",
    databasePassword: "test-db-password-tasks",
    secretKeyBase: "test-secret-key-base-tasks",
    port: 8001,
    healthPath: "/health",
    loginPath: "/login",
    protectedPath: "/tasks",
    ...overrides,
  };
}

export function addApp(store: SecretStore, input: NewAppInput): ApplicationRecord {
  return store.createApp(input);
}

// The HMS service itself: an apps row whose secrets live in hms_config.
export function addHms(store: SecretStore): ApplicationRecord {
  const app = store.createApp({
    appKey: "hms",
    runtime: "fastapi",
    domain: "example.test",
    subdomain: "hms",
    sourceRepository: "git@github.com:example/hms.git",
    deployPath: "/srv/hms",
    databaseName: "hms_production",
    databaseUsername: "hms",
    port: 5050,
    healthPath: "/health",
    loginPath: "/login",
    protectedPath: "/apps",
  });
  store.setHmsConfig("jwt_secret", "test-jwt-secret");
  store.setHmsConfig("db_name", "hms_production");
  store.setHmsConfig("db_user", "hms");
  store.setHmsConfig("db_password", "test-hms-db-password");
  store.setHmsConfig("admin_username", "admin");
  store.setHmsConfig("admin_password_hash", "test-not-a-real-hash");
  return app;
}

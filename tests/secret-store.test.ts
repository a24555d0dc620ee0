import { describe, expect, it } from "vitest";
import {
  DeploymentLockedError,
  IncompleteSecretError,
  InvalidInputError,
  NotFoundError,
  SecretReuseError,
} from "../lib/errors";
import { generateSecret } from "../lib/secret-store";
import { addApp, addHms, createTestStore, fastapiApp, railsApp } from "./helpers/fixtures";

describe("SecretStore", () => {
  describe("getAppSecrets", () => {
    it("maps secret columns and API keys to environment names", () => {
      const { store } = createTestStore();
      addApp(store, railsApp({ apiToken: "test-api-token-humidor" }));
      store.updateAppSecret("humidor", "STRIPE_API_KEY", "test-stripe-key");

      expect(store.getAppSecrets("humidor")).toEqual({
        DATABASE_NAME: "humidor_production",
        DATABASE_USERNAME: "humidor",
        DATABASE_PASSWORD: "test-db-password-humidor",
        SECRET_KEY_BASE: "test-secret-key-base-humidor",
        API_TOKEN: "test-api-token-humidor",
        STRIPE_API_KEY: "test-stripe-key",
      });
    });

    it("omits API_TOKEN when none is set", () => {
      const { store } = createTestStore();
      addApp(store, railsApp());

      expect(Object.keys(store.getAppSecrets("humidor")).sort()).toEqual([
        "DATABASE_NAME",
        "DATABASE_PASSWORD",
        "DATABASE_USERNAME",
        "SECRET_KEY_BASE",
      ]);
    });

    it("treats unknown and disabled apps as not found", () => {
      const { store } = createTestStore();
      addApp(store, railsApp());
      store.setAppEnabled("humidor", false);

      expect(() => store.getAppSecrets("nope")).toThrow(NotFoundError);
      expect(() => store.getAppSecrets("humidor")).toThrow(NotFoundError);
    });

    it("names the missing fields of an incomplete record", () => {
      const { store } = createTestStore();
      addApp(store, railsApp({ secretKeyBase: null }));

      let caught: unknown;
      try {
        store.getAppSecrets("humidor");
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(IncompleteSecretError);
      expect(caught instanceof IncompleteSecretError && caught.missingFields).toEqual(["secret_key_base"]);
    });
  });

  describe("getHmsSecrets", () => {
    it("reads hms_config and fills in database host and port", () => {
      const { store } = createTestStore();
      addHms(store);

      expect(store.getHmsSecrets()).toEqual({
        HMS_ADMIN_USERNAME: "admin",
        HMS_ADMIN_PASSWORD_HASH: "test-not-a-real-hash",
        JWT_SECRET_KEY: "test-jwt-secret",
        DATABASE_HOST: "localhost",
        DATABASE_PORT: "5432",
        DATABASE_NAME: "hms_production",
        DATABASE_USERNAME: "hms",
        DATABASE_PASSWORD: "test-hms-db-password",
      });
      expect(store.getDeploySecrets("hms")).toEqual(store.getHmsSecrets());
    });

    it("fails on missing required keys", () => {
      const { store } = createTestStore();
      store.setHmsConfig("db_name", "hms_production");

      expect(() => store.getHmsSecrets()).toThrow(
        "Incomplete secrets for hms_config: missing admin_username, admin_password_hash, jwt_secret, db_user, db_password",
      );
    });
  });

  describe("updateAppSecret", () => {
    it("rejects a value already used by another app", () => {
      const { store } = createTestStore();
      addApp(store, railsApp());
      addApp(store, fastapiApp());

      expect(() => store.updateAppSecret("tasks", "api_token", "test-db-password-humidor")).toThrow(SecretReuseError);
      expect(store.getAppSecrets("tasks").API_TOKEN).toBeUndefined();
    });

    it("rejects a value reused from another app's API key", () => {
      const { store } = createTestStore();
      addApp(store, railsApp());
      addApp(store, fastapiApp());
      store.updateAppSecret("humidor", "MAPS_API_KEY", "test-maps-key");

      expect(() => store.updateAppSecret("tasks", "MAPS_API_KEY", "test-maps-key")).toThrow(
        "Refusing to set MAPS_API_KEY for tasks: value is already used by humidor",
      );
    });

    it("allows the same app to keep a value across fields", () => {
      const { store } = createTestStore();
      addApp(store, railsApp());

      store.updateAppSecret("humidor", "database_password", "test-new-password");
      expect(store.getAppSecrets("humidor").DATABASE_PASSWORD).toBe("test-new-password");
    });

    it("rejects unknown and reserved field names", () => {
      const { store } = createTestStore();
      addApp(store, railsApp());

      expect(() => store.updateAppSecret("humidor", "password", "x-value")).toThrow(InvalidInputError);
      expect(() => store.updateAppSecret("humidor", "DATABASE_NAME", "x-value")).toThrow(InvalidInputError);
      expect(() => store.updateAppSecret("humidor", "api_token", "")).toThrow(InvalidInputError);
    });
  });

  it("rotates a secret to a fresh random value", () => {
    const { store } = createTestStore();
    addApp(store, railsApp());

    store.rotateAppSecret("humidor", "secret_key_base");

    const rotated = store.getAppSecrets("humidor").SECRET_KEY_BASE;
    expect(rotated).toMatch(/^[0-9a-f]{128}$/);
  });

  it("generates URL-safe tokens for everything but secret_key_base", () => {
    expect(generateSecret("api_token")).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(generateSecret("database_password")).not.toBe(generateSecret("database_password"));
  });

  it("never returns secrets from listApps", () => {
    const { store } = createTestStore();
    addApp(store, railsApp({ apiToken: "test-api-token-humidor" }));

    const [app] = store.listApps();
    expect(app.appKey).toBe("humidor");
    const serialized = JSON.stringify(store.listApps());
    expect(serialized).not.toContain("test-db-password-humidor");
    expect(serialized).not.toContain("test-secret-key-base-humidor");
    expect(serialized).not.toContain("test-api-token-humidor");
  });

  describe("createApp", () => {
    it("validates the application record", () => {
      const { store } = createTestStore();

      expect(() => store.createApp(railsApp({ appKey: "Bad Key" }))).toThrow(InvalidInputError);
      expect(() => store.createApp(railsApp({ apiPath: "/api/{token}" }))).toThrow(
        "apiResourceKey is required when apiPath is set",
      );
    });

    it("rejects a duplicate key", () => {
      const { store } = createTestStore();
      addApp(store, railsApp());

      expect(() => store.createApp(railsApp({ port: 3002 }))).toThrow("App with key 'humidor' already exists");
    });

    it("rejects secrets already used by another app", () => {
      const { store } = createTestStore();
      addApp(store, railsApp());

      expect(() => store.createApp(fastapiApp({ databasePassword: "test-db-password-humidor" }))).toThrow(
        "Refusing to set database_password for tasks: value is already used by humidor",
      );
      expect(() => store.createApp(fastapiApp({ apiToken: "test-secret-key-base-humidor" }))).toThrow(SecretReuseError);
      expect(store.listApps().map((app) => app.appKey)).toEqual(["humidor"]);
    });

    it("gives every app its own role, database, port and directory", () => {
      const { store } = createTestStore();
      addApp(store, railsApp());

      expect(() => store.createApp(fastapiApp({ databaseUsername: "humidor" }))).toThrow(
        "Database role humidor is already used by humidor",
      );
      expect(() => store.createApp(fastapiApp({ databaseName: "humidor_production" }))).toThrow(
        "Database humidor_production is already used by humidor",
      );
      expect(() => store.createApp(fastapiApp({ port: 3001 }))).toThrow("Port 3001 is already used by humidor");
      expect(() => store.createApp(fastapiApp({ deployPath: "/srv/humidor/" }))).toThrow(InvalidInputError);
      expect(() => store.createApp(fastapiApp({ deployPath: "/srv/humidor/tasks" }))).toThrow(
        "Deploy path /srv/humidor/tasks overlaps /srv/humidor of humidor",
      );
      expect(() => store.createApp(fastapiApp({ deployPath: "/srv" }))).toThrow(InvalidInputError);
      expect(store.createApp(fastapiApp({ deployPath: "/srv/humidor-tasks" })).deployPath).toBe("/srv/humidor-tasks");
    });

    it("applies defaults", () => {
      const { store } = createTestStore();
      const app = store.createApp(railsApp({ deployPath: "/srv/humidor/" }));

      expect(app.deployPath).toBe("/srv/humidor");
      expect(app.healthPath).toBe("/up");
      expect(app.loginPath).toBe("/users/sign_in");
      expect(app.enabled).toBe(true);
    });
  });

  describe("admin credentials", () => {
    it("stores a bcrypt hash and verifies against it", () => {
      const { store } = createTestStore();
      store.setHmsAdmin("admin", "test-password-long");

      expect(store.verifyHmsAdmin("admin", "test-password-long")).toBe(true);
      expect(store.verifyHmsAdmin("admin", "wrong-password-x")).toBe(false);
      expect(store.verifyHmsAdmin("someone", "test-password-long")).toBe(false);
    }, 20_000);

    it("refuses short passwords", () => {
      const { store } = createTestStore();
      expect(() => store.setHmsAdmin("admin", "short")).toThrow("Admin password must be at least 12 characters");
    });
  });

  describe("deploy locks", () => {
    it("serializes runs for the same app", () => {
      const { store } = createTestStore();
      addApp(store, railsApp());

      store.acquireDeployLock("humidor", "host-a:1");
      expect(() => store.acquireDeployLock("humidor", "host-b:2")).toThrow(DeploymentLockedError);

      // A release from a different holder leaves the lock in place.
      store.releaseDeployLock("humidor", "host-b:2");
      expect(() => store.acquireDeployLock("humidor", "host-b:2")).toThrow(DeploymentLockedError);

      store.releaseDeployLock("humidor", "host-a:1");
      expect(() => store.acquireDeployLock("humidor", "host-b:2")).not.toThrow();
    });

    it("force release returns the stale holder", () => {
      const { store } = createTestStore();
      store.acquireDeployLock("humidor", "host-a:1");

      expect(store.forceReleaseDeployLock("humidor")?.holder).toBe("host-a:1");
      expect(store.forceReleaseDeployLock("humidor")).toBeUndefined();
    });
  });
});

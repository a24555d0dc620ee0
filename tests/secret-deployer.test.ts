import { describe, expect, it } from "vitest";
import { IncompleteSecretError, RemoteUnreachableError } from "../lib/errors";
import { SecretDeployer } from "../lib/secret-deployer";
import { MANAGED_BEGIN, MANAGED_END, renderUnit } from "../lib/systemctl";
import { FakeShell } from "./helpers/fake-shell";
import { addApp, addHms, createTestStore, layout, railsApp } from "./helpers/fixtures";

const UNIT_PATH = "/etc/systemd/system/humidor.service";

function setup() {
  const { store } = createTestStore();
  const app = addApp(store, railsApp());
  const shell = new FakeShell();
  const deployer = new SecretDeployer(store, shell, layout);
  return { store, app, shell, deployer };
}

describe("SecretDeployer", () => {
  it("renders the full unit when none exists, then enables and restarts it", async () => {
    const { store, app, shell, deployer } = setup();

    const result = await deployer.deploySecrets("humidor");

    expect(result).toEqual({
      appKey: "humidor",
      unitPath: UNIT_PATH,
      changed: true,
      created: true,
      restarted: true,
      variableCount: 4,
    });
    expect(shell.files.get(UNIT_PATH)).toBe(
      renderUnit(app, store.getAppSecrets("humidor"), { template: "rails", user: "deploy" }),
    );
    expect(shell.commands().slice(-3)).toEqual([
      "systemctl daemon-reload",
      "systemctl enable 'humidor.service'",
      "systemctl restart 'humidor.service'",
    ]);
  });

  it("leaves a byte-identical file and writes nothing on an unchanged second run", async () => {
    const { shell, deployer } = setup();
    await deployer.deploySecrets("humidor");
    const first = shell.files.get(UNIT_PATH);
    const callsBefore = shell.calls.length;

    const result = await deployer.deploySecrets("humidor");

    expect(result.changed).toBe(false);
    expect(result.created).toBe(false);
    expect(shell.files.get(UNIT_PATH)).toBe(first);
    const secondRun = shell.commands().slice(callsBefore);
    expect(secondRun.some((command) => command.startsWith("install -m"))).toBe(false);
    expect(secondRun).not.toContain("systemctl enable 'humidor.service'");
  });

  it("only touches the managed section of an existing unit", async () => {
    const { store, shell, deployer } = setup();
    const handEdited = [
      "[Unit]",
      "Description=humidor, tuned by hand",
      "",
      "[Service]",
      "User=deploy",
      "LimitNOFILE=65536",
      MANAGED_BEGIN,
      'Environment="DATABASE_PASSWORD=old"',
      MANAGED_END,
      "ExecStart=/usr/bin/env bundle exec puma -C config/puma.rb",
      "",
    ].join("\n");
    shell.files.set(UNIT_PATH, handEdited);
    store.updateAppSecret("humidor", "api_token", "test-api-token-humidor");

    await deployer.deploySecrets("humidor", { restart: false });

    expect(shell.files.get(UNIT_PATH)).toBe(
      [
        "[Unit]",
        "Description=humidor, tuned by hand",
        "",
        "[Service]",
        "User=deploy",
        "LimitNOFILE=65536",
        MANAGED_BEGIN,
        'Environment="API_TOKEN=test-api-token-humidor"',
        'Environment="DATABASE_NAME=humidor_production"',
        'Environment="DATABASE_PASSWORD=test-db-password-humidor"',
        'Environment="DATABASE_USERNAME=humidor"',
        'Environment="SECRET_KEY_BASE=test-secret-key-base-humidor"',
        MANAGED_END,
        "ExecStart=/usr/bin/env bundle exec puma -C config/puma.rb",
        "",
      ].join("\n"),
    );
    expect(shell.commands()).not.toContain("systemctl restart 'humidor.service'");
  });

  it("keeps secret values off every command line", async () => {
    const { shell, deployer } = setup();

    await deployer.deploySecrets("humidor");

    for (const command of shell.commands()) {
      expect(command).not.toContain("test-db-password-humidor");
      expect(command).not.toContain("test-secret-key-base-humidor");
    }
    expect(shell.calls.some((call) => call.input?.includes("test-db-password-humidor"))).toBe(true);
  });

  it("fails on incomplete secrets before any remote command", async () => {
    const { store } = createTestStore();
    addApp(store, railsApp({ databasePassword: null }));
    const shell = new FakeShell();

    await expect(new SecretDeployer(store, shell, layout).deploySecrets("humidor")).rejects.toThrow(IncompleteSecretError);
    expect(shell.calls).toHaveLength(0);
  });

  it("writes nothing when the host is unreachable", async () => {
    const { shell, deployer } = setup();
    shell.on(/^cat -- /, () => {
      throw new RemoteUnreachableError("fake-host", "Connection refused");
    });

    await expect(deployer.deploySecrets("humidor")).rejects.toThrow("Cannot reach fake-host: Connection refused");
    expect(shell.files.has(UNIT_PATH)).toBe(false);
  });

  it("uses hms_config and the HMS template for the HMS service", async () => {
    const { store } = createTestStore();
    addHms(store);
    const shell = new FakeShell();

    const result = await new SecretDeployer(store, shell, layout).deploySecrets("hms");

    const unit = shell.files.get("/etc/systemd/system/hms.service") ?? "";
    expect(result.variableCount).toBe(8);
    expect(unit.split("\n")).toContain('Environment="JWT_SECRET_KEY=test-jwt-secret"');
    expect(unit.split("\n")).toContain("ExecStart=/srv/hms/.venv/bin/uvicorn app_fastapi:app --host 127.0.0.1 --port 5050");
  });
});

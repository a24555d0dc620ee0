import { describe, expect, it } from "vitest";
import { CommandFailedError } from "../lib/errors";
import {
  PSQL_COMMAND,
  createDatabaseSql,
  createRoleSql,
  dropDatabaseAndRoleSql,
  psql,
  quoteIdent,
  quoteLiteral,
  roleExists,
} from "../lib/postgres";
import { FakeShell } from "./helpers/fake-shell";

describe("quoting", () => {
  it("doubles embedded quotes", () => {
    expect(quoteIdent('we"ird')).toBe('"we""ird"');
    expect(quoteLiteral("it's")).toBe("'it''s'");
  });

  it("builds role and database statements", () => {
    expect(createRoleSql("humidor", "test-secret")).toBe(
      `CREATE ROLE "humidor" WITH LOGIN CREATEDB PASSWORD 'test-secret';`,
    );
    expect(createDatabaseSql("humidor_production", "humidor")).toBe(
      'CREATE DATABASE "humidor_production" OWNER "humidor";',
    );
    expect(dropDatabaseAndRoleSql("humidor_production", "humidor")).toBe(
      'DROP DATABASE IF EXISTS "humidor_production" WITH (FORCE);\nDROP ROLE IF EXISTS "humidor";',
    );
  });
});

describe("psql", () => {
  it("sends SQL over stdin, never on the command line", async () => {
    const shell = new FakeShell();

    await psql(shell, createRoleSql("humidor", "test-secret"), "psql: create role humidor");

    expect(shell.calls[0].command).toBe(PSQL_COMMAND);
    expect(shell.calls[0].input).toBe(`CREATE ROLE "humidor" WITH LOGIN CREATEDB PASSWORD 'test-secret';\n`);
    expect(shell.roles.has("humidor")).toBe(true);
  });

  it("reports existence from the query output", async () => {
    const shell = new FakeShell();
    expect(await roleExists(shell, "humidor")).toBe(false);

    shell.roles.add("humidor");
    expect(await roleExists(shell, "humidor")).toBe(true);
  });

  it("raises with the label when psql fails", async () => {
    const shell = new FakeShell();
    shell.roles.add("humidor");

    await expect(psql(shell, createRoleSql("humidor", "test-secret"), "psql: create role humidor")).rejects.toThrow(
      new CommandFailedError("psql: create role humidor", 1, 'ERROR:  role "humidor" already exists\n'),
    );
  });
});

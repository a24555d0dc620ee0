import type { RemoteShell } from './shell';
import { execOrThrow } from './shell';

// SQL goes over stdin so passwords never show up in a process listing.
export const PSQL_COMMAND = 'sudo -u postgres psql -X -v ON_ERROR_STOP=1 -tA';

export function quoteIdent(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export async function psql(shell: RemoteShell, sql: string, label: string, timeoutMs?: number): Promise<string> {
  const result = await execOrThrow(shell, PSQL_COMMAND, { input: `${sql}\n`, label, timeoutMs });
  return result.stdout.trim();
}

export async function roleExists(shell: RemoteShell, role: string, timeoutMs?: number): Promise<boolean> {
  const out = await psql(shell, `SELECT 1 FROM pg_roles WHERE rolname = ${quoteLiteral(role)};`, `psql: look up role ${role}`, timeoutMs);
  return out === '1';
}

export async function databaseExists(shell: RemoteShell, database: string, timeoutMs?: number): Promise<boolean> {
  const out = await psql(
    shell,
    `SELECT 1 FROM pg_database WHERE datname = ${quoteLiteral(database)};`,
    `psql: look up database ${database}`,
    timeoutMs,
  );
  return out === '1';
}

export function createRoleSql(role: string, password: string): string {
  return `CREATE ROLE ${quoteIdent(role)} WITH LOGIN CREATEDB PASSWORD ${quoteLiteral(password)};`;
}

export function createDatabaseSql(database: string, owner: string): string {
  return `CREATE DATABASE ${quoteIdent(database)} OWNER ${quoteIdent(owner)};`;
}

// psql runs each statement on its own, so DROP DATABASE stays outside a transaction.
export function dropDatabaseAndRoleSql(database: string, role: string): string {
  return [
    `DROP DATABASE IF EXISTS ${quoteIdent(database)} WITH (FORCE);`,
    `DROP ROLE IF EXISTS ${quoteIdent(role)};`,
  ].join('\n');
}

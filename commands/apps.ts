import chalk from "chalk";
import { Command } from "commander";
import * as log from "../lib/logger";
import { InvalidInputError } from "../lib/errors";
import { fqdn } from "../lib/models";
import type { AppRuntime } from "../lib/models";
import { generateSecret } from "../lib/secret-store";
import { handleCommandError, withStore } from "./helpers";

interface AddAppOptions {
  app: string;
  runtime: string;
  domain: string;
  subdomain?: string;
  repo: string;
  branch: string;
  path: string;
  dbName: string;
  dbUser: string;
  port: string;
  healthPath?: string;
  loginPath?: string;
  protectedPath?: string;
  apiPath?: string;
  apiResourceKey?: string;
  generateSecrets: boolean;
}

function parseRuntime(value: string): AppRuntime {
  if (value === "rails" || value === "fastapi") return value;
  throw new InvalidInputError(`Unknown runtime '${value}': expected rails or fastapi`);
}

async function addAppAction(options: AddAppOptions) {
  try {
    const app = await withStore((store) =>
      store.createApp({
        appKey: options.app,
        runtime: parseRuntime(options.runtime),
        domain: options.domain,
        subdomain: options.subdomain ?? null,
        sourceRepository: options.repo,
        branch: options.branch,
        deployPath: options.path,
        databaseName: options.dbName,
        databaseUsername: options.dbUser,
        databasePassword: options.generateSecrets ? generateSecret("database_password") : null,
        secretKeyBase: options.generateSecrets ? generateSecret("secret_key_base") : null,
        port: Number(options.port),
        healthPath: options.healthPath,
        loginPath: options.loginPath,
        protectedPath: options.protectedPath,
        apiPath: options.apiPath ?? null,
        apiResourceKey: options.apiResourceKey ?? null,
      })
    );
    log.success(`Added ${app.appKey} (${app.runtime}) at ${fqdn(app)} -> 127.0.0.1:${app.port}`);
    if (!options.generateSecrets) {
      log.warn(`Set database_password and secret_key_base with 'hms secrets set' before deploying`);
    }
  } catch (err) {
    handleCommandError(err, "Adding app failed");
  }
}

async function listAppsAction() {
  try {
    const apps = await withStore((store) => store.listApps());
    if (apps.length === 0) {
      log.info("No applications registered");
      return;
    }
    for (const app of apps) {
      const state = app.enabled ? chalk.green("enabled ") : chalk.dim("disabled");
      log.info(`${state} ${app.appKey.padEnd(16)} ${app.runtime.padEnd(8)} ${fqdn(app)} :${app.port} ${app.branch}`);
    }
  } catch (err) {
    handleCommandError(err, "Listing apps failed");
  }
}

function setEnabledAction(enabled: boolean) {
  return async (options: { app: string }) => {
    try {
      await withStore((store) => store.setAppEnabled(options.app, enabled));
      log.success(`${options.app} ${enabled ? "enabled" : "disabled"}`);
    } catch (err) {
      handleCommandError(err, `${enabled ? "Enabling" : "Disabling"} app failed`);
    }
  };
}

async function historyAction(options: { app: string; limit: string }) {
  try {
    const limit = parseInt(options.limit, 10);
    const rows = await withStore((store) => store.listDeployments(options.app, isNaN(limit) ? 10 : limit));
    if (rows.length === 0) {
      log.info(`No deployments recorded for ${options.app}`);
      return;
    }
    for (const row of rows) {
      const status = row.status === "succeeded" ? chalk.green(row.status) : chalk.red(row.status);
      log.info(`#${row.id} ${row.started_at} ${row.mode.padEnd(16)} ${status}${row.failed_step ? ` at ${row.failed_step}` : ""}`);
    }
  } catch (err) {
    handleCommandError(err, "Listing history failed");
  }
}

async function unlockAction(options: { app: string }) {
  try {
    const released = await withStore((store) => store.forceReleaseDeployLock(options.app));
    if (released) {
      log.success(`Released lock on ${options.app} held by ${released.holder} since ${released.acquired_at}`);
    } else {
      log.info(`${options.app} was not locked`);
    }
  } catch (err) {
    handleCommandError(err, "Unlock failed");
  }
}

/**
 * Register application registry commands: apps, history, unlock
 * @param program Commander program
 */
export function registerAppCommands(program: Command): void {
  const apps = program.command("apps").description("Manage the application registry");

  apps
    .command("add")
    .description("Register a new application")
    .requiredOption("-a, --app <key>", "Application key")
    .requiredOption("--domain <domain>", "Domain the app is served under")
    .option("--subdomain <subdomain>", "Subdomain prefix")
    .requiredOption("--repo <url>", "Source repository (GitHub HTTPS or SSH URL)")
    .option("--branch <branch>", "Branch to deploy", "main")
    .requiredOption("--path <dir>", "Deploy path on the host")
    .requiredOption("--db-name <name>", "PostgreSQL database name")
    .requiredOption("--db-user <name>", "PostgreSQL role")
    .requiredOption("--port <port>", "Local port the app listens on")
    .option("--runtime <runtime>", "rails or fastapi", "rails")
    .option("--health-path <path>", "Health check path")
    .option("--login-path <path>", "Login page path")
    .option("--protected-path <path>", "A path that requires authentication")
    .option("--api-path <path>", "Token API path ({token} is substituted)")
    .option("--api-resource-key <key>", "Top-level key the token API returns")
    .option("--no-generate-secrets", "Do not generate database_password and secret_key_base")
    .action(addAppAction);

  apps.command("list").description("List registered applications").action(listAppsAction);

  apps
    .command("enable")
    .description("Enable an application")
    .requiredOption("-a, --app <key>", "Application key")
    .action(setEnabledAction(true));

  apps
    .command("disable")
    .description("Disable an application; it can no longer be deployed")
    .requiredOption("-a, --app <key>", "Application key")
    .action(setEnabledAction(false));

  program
    .command("history")
    .description("Show recent deployments of an application")
    .requiredOption("-a, --app <key>", "Application key")
    .option("-n, --limit <count>", "Number of runs", "10")
    .action(historyAction);

  program
    .command("unlock")
    .description("Release a stale deployment lock")
    .requiredOption("-a, --app <key>", "Application key")
    .action(unlockAction);
}

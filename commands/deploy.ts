import chalk from "chalk";
import { Command } from "commander";
import type { DeploymentResult } from "../lib/deployment";
import type { HealthReport } from "../lib/health";
import * as log from "../lib/logger";
import type { DeployMode } from "../lib/models";
import { InvalidInputError } from "../lib/errors";
import { ExitCodes, handleCommandError, withServices } from "./helpers";

const CHECK_MARKS = {
  pass: chalk.green("✓"),
  fail: chalk.red("✗"),
  skipped: chalk.dim("-"),
} as const;

export function printHealthReport(report: HealthReport): void {
  log.info(`Health of ${report.appKey} at ${report.baseUrl}:`);
  for (const check of report.checks) {
    log.info(`  ${CHECK_MARKS[check.status]} ${check.name.padEnd(15)} ${check.detail}`);
  }
  if (report.healthy) {
    log.success(`${report.appKey} is healthy`);
  } else {
    log.error(`${report.appKey} is unhealthy: ${report.errors.length} check(s) failed`);
  }
}

function resolveMode(options: { setup?: boolean; migrateOnly?: boolean }): DeployMode {
  if (options.setup && options.migrateOnly) {
    throw new InvalidInputError("--setup and --migrate-only are mutually exclusive");
  }
  if (options.setup) return "first_time";
  if (options.migrateOnly) return "migrate_only";
  return "code_and_migrate";
}

function printDeploymentResult(result: DeploymentResult): void {
  if (!result.succeeded) {
    const failed = result.failedStep;
    log.error(`Deployment of ${result.appKey} failed at ${failed?.stepName}`);
    if (failed?.stderrExcerpt) {
      console.error(chalk.dim(failed.stderrExcerpt));
    }
    return;
  }

  log.success(`Deployed ${result.appKey} (${result.mode})${result.commit ? ` at ${result.commit}` : ""}`);
  if (!result.health) return;

  printHealthReport(result.health);
  if (!result.health.healthy) {
    log.warn(`Deployment of ${result.appKey} is NOT done: the health check failed`);
  }
}

async function deployAction(options: {
  app: string;
  setup?: boolean;
  migrateOnly?: boolean;
  local?: boolean;
  skipHealthCheck?: boolean;
  baseUrl?: string;
}): Promise<void> {
  try {
    const mode = resolveMode(options);
    const result = await withServices({ local: options.local }, ({ orchestrator }) =>
      orchestrator.deploy(options.app, mode, {
        runHealthCheck: !options.skipHealthCheck,
        healthBaseUrl: options.baseUrl,
      })
    );
    printDeploymentResult(result);
    if (!result.succeeded) {
      process.exit(ExitCodes.GENERAL_ERROR);
    }
  } catch (err) {
    handleCommandError(err, "Deploy failed");
  }
}

async function healthCheckAction(options: { app: string; local?: boolean; baseUrl?: string; json?: boolean }): Promise<void> {
  try {
    const report = await withServices({ local: options.local }, ({ health }) =>
      health.healthCheck(options.app, { baseUrl: options.baseUrl })
    );
    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printHealthReport(report);
    }
    if (!report.healthy) {
      process.exit(ExitCodes.GENERAL_ERROR);
    }
  } catch (err) {
    handleCommandError(err, "Health check failed");
  }
}

async function decommissionAction(options: { app: string; force?: boolean; local?: boolean }): Promise<void> {
  try {
    log.warn(`Decommissioning ${options.app}: service, proxy config, certificate, files and database will be removed`);
    await withServices({ local: options.local }, ({ decommissioner }) =>
      decommissioner.decommission(options.app, { force: options.force })
    );
    log.success(`${options.app} decommissioned; backups were left untouched`);
  } catch (err) {
    handleCommandError(err, "Decommission failed");
  }
}

/**
 * Register host-facing commands: deploy, health-check, decommission
 * @param program Commander program
 */
export function registerDeployCommands(program: Command): void {
  program
    .command("deploy")
    .description("Deploy an application (code and migrations by default)")
    .requiredOption("-a, --app <key>", "Application key")
    .option("--setup", "First-time deployment: provision database, proxy and certificate")
    .option("--migrate-only", "Only install dependencies, run migrations and restart")
    .option("--local", "Run on this machine instead of over SSH")
    .option("--skip-health-check", "Do not run the health check afterwards")
    .option("--base-url <url>", "Base URL for the post-deploy health check")
    .action(deployAction);

  program
    .command("health-check")
    .description("Verify a deployed application from the outside")
    .requiredOption("-a, --app <key>", "Application key")
    .option("--local", "Run host checks on this machine instead of over SSH")
    .option("--base-url <url>", "Override https://<fqdn>")
    .option("--json", "Print the report as JSON")
    .action(healthCheckAction);

  program
    .command("decommission")
    .description("Irreversibly remove an application from the host (backups are kept)")
    .requiredOption("-a, --app <key>", "Application key")
    .option("--force", "Confirm the removal")
    .option("--local", "Run on this machine instead of over SSH")
    .action(decommissionAction);
}

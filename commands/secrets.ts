import { Command } from "commander";
import * as log from "../lib/logger";
import type { UnitTemplate } from "../lib/systemctl";
import { InvalidInputError } from "../lib/errors";
import { handleCommandError, withServices, withStore } from "./helpers";

function parseTemplate(value: string | undefined): UnitTemplate | undefined {
  if (value === undefined) return undefined;
  if (value === "rails" || value === "hms") return value;
  throw new InvalidInputError(`Unknown template '${value}': expected rails or hms`);
}

async function deploySecretsAction(options: { app: string; template?: string; restart: boolean; local?: boolean }) {
  try {
    const template = parseTemplate(options.template);
    const result = await withServices({ local: options.local }, ({ secretDeployer }) =>
      secretDeployer.deploySecrets(options.app, { template, restart: options.restart })
    );
    const state = result.created ? "created" : result.changed ? "updated" : "already up to date";
    log.success(`${result.variableCount} variables for ${result.appKey} in ${result.unitPath} (${state})`);
    if (result.restarted) {
      log.info(`Restarted ${result.appKey}.service`);
    }
  } catch (err) {
    handleCommandError(err, "Secret deploy failed");
  }
}

async function setSecretAction(options: { app: string; field: string; value: string }) {
  try {
    await withStore((store) => store.updateAppSecret(options.app, options.field, options.value));
    log.success(`Updated ${options.field} for ${options.app}; run 'hms secrets deploy --app ${options.app}' to apply it`);
  } catch (err) {
    handleCommandError(err, "Setting secret failed");
  }
}

async function rotateSecretAction(options: { app: string; field: string }) {
  try {
    await withStore((store) => store.rotateAppSecret(options.app, options.field));
    log.success(`Rotated ${options.field} for ${options.app}`);
    if (options.field === "database_password") {
      log.warn("The PostgreSQL role still has the old password; update it before deploying the new secrets");
    }
  } catch (err) {
    handleCommandError(err, "Rotating secret failed");
  }
}

/**
 * Register secret management commands
 * @param program Commander program
 */
export function registerSecretCommands(program: Command): void {
  const secrets = program.command("secrets").description("Manage application secrets");

  secrets
    .command("deploy")
    .description("Write an application's secrets into its systemd unit")
    .requiredOption("-a, --app <key>", "Application key")
    .option("--template <name>", "Unit template when the unit does not exist yet (rails or hms)")
    .option("--no-restart", "Do not restart the service afterwards")
    .option("--local", "Run on this machine instead of over SSH")
    .action(deploySecretsAction);

  secrets
    .command("set")
    .description("Set one secret field (database_password, secret_key_base, api_token or an API key name)")
    .requiredOption("-a, --app <key>", "Application key")
    .requiredOption("-f, --field <field>", "Secret field")
    .requiredOption("-v, --value <value>", "New value")
    .action(setSecretAction);

  secrets
    .command("rotate")
    .description("Replace one secret field with a freshly generated value")
    .requiredOption("-a, --app <key>", "Application key")
    .requiredOption("-f, --field <field>", "Secret field")
    .action(rotateSecretAction);
}

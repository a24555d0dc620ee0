import { Command } from "commander";
import { loadConfig } from "../lib/config";
import { InvalidInputError } from "../lib/errors";
import * as log from "../lib/logger";
import { HMS_CONFIG_KEYS } from "../lib/secret-store";
import type { HmsConfigKey } from "../lib/secret-store";
import { createServices } from "../lib/services";
import { startServer } from "../server";
import { handleCommandError, withStore } from "./helpers";

function parseConfigKey(value: string): HmsConfigKey {
  const key = HMS_CONFIG_KEYS.find((candidate) => candidate === value);
  if (!key) {
    throw new InvalidInputError(`Unknown hms_config key '${value}': expected one of ${HMS_CONFIG_KEYS.join(", ")}`);
  }
  if (key === "admin_password_hash") {
    throw new InvalidInputError("Use 'hms hms-config set-admin' to set the admin password");
  }
  return key;
}

async function setConfigAction(key: string, value: string) {
  try {
    const configKey = parseConfigKey(key);
    await withStore((store) => store.setHmsConfig(configKey, value));
    log.success(`hms_config.${configKey} updated`);
  } catch (err) {
    handleCommandError(err, "Updating hms_config failed");
  }
}

async function setAdminAction(options: { username: string; password: string }) {
  try {
    await withStore((store) => store.setHmsAdmin(options.username, options.password));
    log.success(`Admin credentials for ${options.username} stored`);
  } catch (err) {
    handleCommandError(err, "Setting admin failed");
  }
}

function serveAction(options: { port?: string; local?: boolean }) {
  try {
    const config = loadConfig();
    const port = options.port ? parseInt(options.port, 10) : config.serverPort;
    if (isNaN(port) || port < 1 || port > 65535) {
      throw new InvalidInputError(`Invalid port: ${options.port}. Port must be a number between 1-65535`);
    }
    const services = createServices(config, { local: options.local });
    startServer(services, port);
  } catch (err) {
    handleCommandError(err, "Starting operator API failed");
  }
}

/**
 * Register HMS administration commands: hms-config, serve
 * @param program Commander program
 */
export function registerAdminCommands(program: Command): void {
  const hmsConfig = program.command("hms-config").description("Manage the HMS service's own configuration");

  hmsConfig
    .command("set <key> <value>")
    .description(`Set one key (${HMS_CONFIG_KEYS.filter((key) => key !== "admin_password_hash").join(", ")})`)
    .action(setConfigAction);

  hmsConfig
    .command("set-admin")
    .description("Set the admin username and password (stored as a bcrypt hash)")
    .requiredOption("-u, --username <username>", "Admin username")
    .requiredOption("-p, --password <password>", "Admin password, at least 12 characters")
    .action(setAdminAction);

  program
    .command("serve")
    .description("Run the socket.io operator API")
    .option("-p, --port <port>", "Port to listen on (default: PORT)")
    .option("--local", "Run host commands on this machine instead of over SSH")
    .action(serveAction);
}

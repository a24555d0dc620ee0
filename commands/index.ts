import { Command } from "commander";
import { registerAdminCommands } from "./admin";
import { registerAppCommands } from "./apps";
import { registerDeployCommands } from "./deploy";
import { registerSecretCommands } from "./secrets";

/**
 * Register CLI commands.
 *
 * Host-facing (SSH, or this machine with --local):
 * - deploy, health-check, decommission, secrets deploy, serve
 *
 * Store-only:
 * - apps, secrets set/rotate, hms-config, history, unlock
 */
export function registerCommands(program: Command): void {
  registerDeployCommands(program);
  registerSecretCommands(program);
  registerAppCommands(program);
  registerAdminCommands(program);
}

import chalk from "chalk";
import { loadConfig } from "../lib/config";
import type { HmsConfig } from "../lib/config";
import { HmsError, errorMessage } from "../lib/errors";
import * as log from "../lib/logger";
import { createServices, openStore } from "../lib/services";
import type { ServiceOptions, Services } from "../lib/services";
import type { SecretStore } from "../lib/secret-store";

/**
 * Exit codes for consistent error handling. Errors raised by the tool carry
 * their own code; these cover everything else.
 */
export const ExitCodes = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGUMENT: 2,
} as const;

export function exitCodeFor(error: unknown): number {
  return error instanceof HmsError ? error.exitCode : ExitCodes.GENERAL_ERROR;
}

export function handleCommandError(error: unknown, context: string): never {
  log.error(`${context}: ${errorMessage(error)}`);
  if (log.getLogLevel() >= log.LogLevel.DEBUG && error instanceof Error && error.stack) {
    console.error(chalk.dim(error.stack));
  }
  process.exit(exitCodeFor(error));
}

// Runs `fn` with host-facing services and always closes the store afterwards.
export async function withServices<T>(
  options: ServiceOptions,
  fn: (services: Services, config: HmsConfig) => Promise<T>,
): Promise<T> {
  const config = loadConfig();
  const services = createServices(config, options);
  try {
    return await fn(services, config);
  } finally {
    services.close();
  }
}

export async function withStore<T>(fn: (store: SecretStore) => T | Promise<T>): Promise<T> {
  const { store, close } = openStore(loadConfig());
  try {
    return await fn(store);
  } finally {
    close();
  }
}

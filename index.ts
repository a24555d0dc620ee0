#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { registerCommands } from "./commands";
import { handleCommandError } from "./commands/helpers";
import { InvalidInputError } from "./lib/errors";
import { parseLogLevel, setLogLevel } from "./lib/logger";

const program = new Command();

program
  .name("hms")
  .description("Deploy and operate Rails and FastAPI apps on a single host")
  .version("0.1.0")
  .option(
    "-l, --log-level <level>",
    "Set logging level (0=none, 1=error, 2=warn, 3=info, 4=debug)"
  );

program.hook("preAction", (command) => {
  const value = command.opts().logLevel;
  if (value === undefined) return;
  const level = parseLogLevel(String(value));
  if (level === undefined) {
    throw new InvalidInputError(`Invalid log level: ${value}. Must be 0 (none), 1 (error), 2 (warn), 3 (info), or 4 (debug)`);
  }
  setLogLevel(level);
});

registerCommands(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  handleCommandError(error, "hms");
});

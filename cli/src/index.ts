#!/usr/bin/env node

/**
 * Tandem CLI — Entry Point
 *
 * Commands:
 *   tandem setup               Install, configure and migrate everything
 *   tandem migrate             Preview the unified config from legacy tools
 *   tandem status              Show elevation, features and installed files
 *
 * Exit codes: 0 success, 1 general error, 2 administrator required,
 * 3 network, 4 file, 5 configuration, 6 cancelled.
 */

import { Command } from "commander";
import { registerSetupCommand } from "./commands/setup";
import { registerMigrateCommand } from "./commands/migrate";
import { registerStatusCommand } from "./commands/status";
import { EXIT_CODES, errorMessage } from "@tandem/engine";

const program = new Command();

program
  .name("tandem")
  .description("Set up the DLL injector and DLC unlocker from one unified configuration")
  .version("0.1.0");

registerSetupCommand(program);
registerMigrateCommand(program);
registerStatusCommand(program);

// Parse command line
program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(EXIT_CODES.GENERAL_ERROR);
});

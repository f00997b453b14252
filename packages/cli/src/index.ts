#!/usr/bin/env -S node --import tsx
import chalk from "chalk";
import { Command, CommanderError } from "commander";
import { EXIT_CODES, ExitCodeMapper } from "./commands/exit-codes.js";
import { createSearchCommand } from "./commands/search.js";
import { version } from "./version.js";

const program = new Command();

program
  .name("treescan")
  .description("Concurrent file search by name, extension, date and content")
  .version(version)
  .exitOverride();

program.addCommand(createSearchCommand().exitOverride());

try {
  await program.parseAsync();
} catch (error) {
  if (error instanceof CommanderError) {
    // Commander has already printed help, the version or the usage problem
    process.exitCode = error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
  } else {
    console.error(chalk.red(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`));
    process.exitCode = ExitCodeMapper.fromException(error);
  }
}

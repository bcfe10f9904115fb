#!/usr/bin/env node

import { CommanderError } from "commander";
import chalk from "chalk";
import { createProgram } from "./program";

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    // Commander has already printed help, the version or the usage error
    if (error instanceof CommanderError) {
      process.exit(error.exitCode);
    }
    console.error(chalk.red("Error:"), error instanceof Error ? error.message : String(error));
    process.exit(1);
  });

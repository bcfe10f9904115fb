/**
 * Terminal output helpers shared by the commands.
 */

import chalk from "chalk";
import type { Ora } from "ora";
import { toProvisionError } from "@tunnelgate/core";
import type { ProgressCallback } from "@tunnelgate/core";
import type { GceLogCallback } from "@tunnelgate/gcp";

/**
 * Print an error with its remediation commands. DEBUG=1 adds the stack.
 */
export function printError(error: unknown, title = "Error"): void {
  const provisionError = toProvisionError(error);

  console.error(chalk.red.bold(`\n❌ ${title}`));
  console.error(chalk.red(provisionError.message));

  if (provisionError.suggestions.length > 0) {
    console.error(chalk.white("\nTry:"));
    for (const suggestion of provisionError.suggestions) {
      console.error(chalk.cyan(`  ${suggestion}`));
    }
  }

  if (process.env.DEBUG) {
    console.error(provisionError.originalError ?? provisionError);
  }
}

/**
 * Log callback for managers. While a spinner runs, detail lines would tear
 * it, so stdout lines only update the spinner text.
 */
export function createLogCallback(spinner?: Ora): GceLogCallback {
  return (message, stream) => {
    if (spinner?.isSpinning) {
      if (stream === "stderr") {
        spinner.clear();
        console.error(chalk.yellow(message));
        spinner.render();
      }
      return;
    }
    if (stream === "stderr") {
      console.error(chalk.yellow(message));
    } else {
      console.log(chalk.gray(message));
    }
  };
}

/**
 * Drive one spinner through the pipeline: each step starts it and ends it
 * with succeed, info (skipped) or fail.
 */
export function createProgressRenderer(spinner: Ora): ProgressCallback {
  return (step, status, message) => {
    switch (status) {
      case "in_progress":
        spinner.start(message ?? `${step}...`);
        break;
      case "complete":
        spinner.succeed(message ?? `Completed: ${step}`);
        break;
      case "skipped":
        spinner.info(chalk.gray(message ?? `Skipped: ${step}`));
        break;
      case "error":
        spinner.fail(message ?? `Failed: ${step}`);
        break;
      default:
        break;
    }
  };
}

export function statusIcon(ok: boolean): string {
  return ok ? chalk.green("✓") : chalk.red("✗");
}

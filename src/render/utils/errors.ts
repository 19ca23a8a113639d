import chalk from "chalk";

import type { CliError } from "../../cli/errors.js";

export function renderWarning(message: string): string {
  return `${chalk.yellow("Warning:")} ${message}`;
}

/** `Error: <message>`, then the hints as a block after a blank line. */
export function renderCliError(error: CliError): string {
  const blocks = [`${chalk.red("Error:")} ${error.message}`];
  if (error.hints.length > 0) {
    blocks.push(error.hints.join("\n"));
  }
  return blocks.join("\n\n");
}

import { renderCliError, renderWarning } from "../render/utils/errors.js";
import type { CliError } from "./errors.js";

// Diagnostics go to stderr; bubbles go straight to the chosen sink.

export function writeWarnings(warnings: readonly string[]): void {
  for (const warning of warnings) {
    process.stderr.write(`${renderWarning(warning)}\n`);
  }
}

export function writeCliError(error: CliError): void {
  process.stderr.write(`\n${renderCliError(error)}\n\n`);
  process.exitCode = error.exitCode;
}

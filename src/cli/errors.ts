import { HintedError, toErrorMessage } from "../utils/errors.js";

export class CliError extends HintedError {
  constructor(
    message: string,
    hints: readonly string[] = [],
    public readonly exitCode = 1,
  ) {
    super(message, hints);
  }
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }

  const hints = error instanceof HintedError ? error.hints : [];
  return new CliError(toErrorMessage(error), hints);
}

import { HintedError } from "../../utils/errors.js";

export class InputFileNotFoundError extends HintedError {
  constructor(public readonly path: string) {
    super(`Input file not found: ${path}`, [
      "Check the path passed to --files and rerun.",
    ]);
  }
}

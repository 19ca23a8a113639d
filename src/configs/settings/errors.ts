import { MASCOT_NAMES } from "../../say/mascots.js";
import { HintedError } from "../../utils/errors.js";

export class SettingsFileError extends HintedError {
  constructor(filePath: string, detail: string) {
    super(`Invalid settings file at ${filePath}: ${detail}`, [
      `Fix or remove ${filePath} and rerun.`,
    ]);
  }
}

export class MascotEnvironmentError extends HintedError {
  constructor(variable: string, value: string) {
    super(`Unknown mascot "${value}" in ${variable}.`, [
      `Set ${variable} to one of: ${MASCOT_NAMES.join(", ")}.`,
    ]);
  }
}

import { readFileSync } from "node:fs";
import { join } from "node:path";
import process from "node:process";

import { load, YAMLException } from "js-yaml";

import { DEFAULT_MASCOT, mascotNameSchema } from "../../say/mascots.js";
import { toErrorMessage } from "../../utils/errors.js";
import { isMissing } from "../../utils/fs.js";
import { MascotEnvironmentError, SettingsFileError } from "./errors.js";
import {
  type Settings,
  type SettingsFile,
  settingsFileSchema,
} from "./types.js";

export const SETTINGS_FILENAME = ".ferris-says.yaml" as const;
export const MASCOT_ENV_VARIABLE = "FERRIS_SAYS_MASCOT" as const;
export const DEFAULT_WIDTH = 40;

export interface LoadSettingsOptions {
  root?: string;
  filePath?: string;
  readFile?: (path: string) => string;
}

export interface ResolveSettingsOptions extends LoadSettingsOptions {
  env?: NodeJS.ProcessEnv;
  /** Values given on the command line; they win over everything else. */
  overrides?: Partial<Settings>;
}

export function loadSettingsFile(
  options: LoadSettingsOptions = {},
): SettingsFile {
  const filePath =
    options.filePath ?? join(options.root ?? process.cwd(), SETTINGS_FILENAME);
  const readFile = options.readFile ?? readUtf8;

  let content: string;
  try {
    content = readFile(filePath);
  } catch (error) {
    if (isMissing(error)) {
      return {};
    }
    throw error;
  }

  return parseSettingsFile(content, filePath);
}

/**
 * Mascot: override, then environment, then settings file, then the crab.
 * Width: override, then settings file, then the default. Sources that
 * cannot change the outcome are never read.
 */
export function resolveSettings(options: ResolveSettingsOptions = {}): Settings {
  const { overrides = {} } = options;
  const mascot =
    overrides.mascot ?? readEnvironmentMascot(options.env ?? process.env);

  if (mascot !== undefined && overrides.width !== undefined) {
    return { mascot, width: overrides.width };
  }

  const file = loadSettingsFile(options);
  return {
    mascot: mascot ?? file.mascot ?? DEFAULT_MASCOT,
    width: overrides.width ?? file.width ?? DEFAULT_WIDTH,
  };
}

function readEnvironmentMascot(
  env: NodeJS.ProcessEnv,
): Settings["mascot"] | undefined {
  const raw = env[MASCOT_ENV_VARIABLE]?.trim();
  if (!raw) {
    return undefined;
  }

  const result = mascotNameSchema.safeParse(raw);
  if (!result.success) {
    throw new MascotEnvironmentError(MASCOT_ENV_VARIABLE, raw);
  }
  return result.data;
}

function parseSettingsFile(content: string, filePath: string): SettingsFile {
  let document: unknown;
  try {
    document = content.trim() === "" ? {} : (load(content) ?? {});
  } catch (error) {
    throw new SettingsFileError(filePath, describeYamlFailure(error));
  }

  const result = settingsFileSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.join(".");
    const detail = issue?.message ?? "Invalid settings value";
    throw new SettingsFileError(filePath, path ? `${path}: ${detail}` : detail);
  }
  return result.data;
}

function describeYamlFailure(error: unknown): string {
  if (error instanceof YAMLException) {
    const line = error.mark ? ` (line ${error.mark.line + 1})` : "";
    return `${error.reason}${line}`;
  }
  return toErrorMessage(error);
}

function readUtf8(path: string): string {
  return readFileSync(path, "utf8");
}

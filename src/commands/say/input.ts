import { readFile } from "node:fs/promises";

import { isMissing } from "../../utils/fs.js";
import { InputFileNotFoundError } from "./errors.js";

export interface ResolveSayInputsOptions {
  text: readonly string[];
  files?: readonly string[];
  readTextFile?: (path: string) => Promise<string>;
  readStdin: () => Promise<string>;
}

/**
 * Files win over text arguments; with neither, standard input is read.
 * Each file becomes its own message.
 */
export async function resolveSayInputs(
  options: ResolveSayInputsOptions,
): Promise<string[]> {
  const { text, files = [], readStdin } = options;
  const readTextFile = options.readTextFile ?? defaultReadTextFile;

  if (files.length > 0) {
    const contents: string[] = [];
    for (const path of files) {
      contents.push(await readInputFile(path, readTextFile));
    }
    return contents;
  }

  if (text.length > 0) {
    return [text.join(" ")];
  }

  return [await readStdin()];
}

async function readInputFile(
  path: string,
  readTextFile: (path: string) => Promise<string>,
): Promise<string> {
  try {
    return await readTextFile(path);
  } catch (error) {
    if (isMissing(error)) {
      throw new InputFileNotFoundError(path);
    }
    throw error;
  }
}

function defaultReadTextFile(path: string): Promise<string> {
  return readFile(path, "utf8");
}

import { Command, Option } from "commander";

import { executeSayCommand } from "../commands/say/command.js";
import { resolveSayInputs } from "../commands/say/input.js";
import { resolveSettings } from "../configs/settings/loader.js";
import { widthSchema } from "../configs/settings/types.js";
import { MASCOT_NAMES, type MascotName } from "../say/mascots.js";
import type { ByteSink } from "../say/sink.js";
import { ValidationError } from "../utils/errors.js";
import { writeWarnings } from "./output.js";

export interface SayCommandIo {
  stdout: ByteSink;
  stderr: ByteSink;
  readStdin: () => Promise<string>;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface SayCommandOptions {
  text: readonly string[];
  files?: readonly string[];
  width?: number;
  mascot?: MascotName;
  stderr?: boolean;
}

export interface SayCommandResult {
  bubbleCount: number;
  warnings: string[];
}

export async function runSayCommand(
  options: SayCommandOptions,
  io: SayCommandIo,
): Promise<SayCommandResult> {
  const settings = resolveSettings({
    root: io.cwd,
    env: io.env,
    overrides: { mascot: options.mascot, width: options.width },
  });
  const files = options.files ?? [];

  const warnings: string[] = [];
  if (files.length > 0 && options.text.length > 0) {
    warnings.push("Ignoring text arguments because --files was given.");
  }

  const messages = await resolveSayInputs({
    text: options.text,
    files,
    readStdin: io.readStdin,
  });

  const { bubbleCount } = executeSayCommand({
    messages,
    width: settings.width,
    mascot: settings.mascot,
    sink: options.stderr ? io.stderr : io.stdout,
  });

  return { bubbleCount, warnings };
}

export function parseWidthOption(value: string): number {
  const digits = value.trim();
  const result = widthSchema.safeParse(
    /^\d+$/u.test(digits) ? Number(digits) : Number.NaN,
  );
  if (!result.success) {
    throw new ValidationError(
      `Expected non-negative integer after --width, got "${value}"`,
    );
  }
  return result.data;
}

interface SayCommandActionOptions {
  width?: number;
  files?: string[];
  mascot?: MascotName;
  stderr?: boolean;
}

export function createSayCommand(io: SayCommandIo): Command {
  return new Command("ferris-says")
    .description("Print a message in a speech bubble above an ASCII mascot")
    .argument("[text...]", "Message to say; read from stdin when omitted")
    .option(
      "-w, --width <columns>",
      "Maximum display width of a line before it wraps",
      parseWidthOption,
    )
    .option("-f, --files <paths...>", "Say the contents of each file")
    .addOption(
      new Option("-m, --mascot <name>", "Mascot drawn under the bubble").choices(
        MASCOT_NAMES,
      ),
    )
    .option("-e, --stderr", "Write to standard error instead of standard output")
    .action(async (text: string[], options: SayCommandActionOptions) => {
      const result = await runSayCommand(
        {
          text,
          files: options.files,
          width: options.width,
          mascot: options.mascot,
          stderr: Boolean(options.stderr),
        },
        io,
      );

      writeWarnings(result.warnings);
    });
}

#!/usr/bin/env node

import process from "node:process";

import { CommanderError } from "commander";

import { toCliError } from "./cli/errors.js";
import { writeCliError } from "./cli/output.js";
import { createSayCommand, type SayCommandIo } from "./cli/say.js";
import { createFileDescriptorSink } from "./say/sink.js";
import { toErrorMessage } from "./utils/errors.js";
import { readStreamText } from "./utils/streams.js";
import { getCliVersion } from "./utils/version.js";

export function createProcessIo(): SayCommandIo {
  return {
    stdout: createFileDescriptorSink(process.stdout.fd),
    stderr: createFileDescriptorSink(process.stderr.fd),
    readStdin: () => readStreamText(process.stdin),
  };
}

export async function runCli(
  argv: readonly string[] = process.argv,
  io: SayCommandIo = createProcessIo(),
): Promise<void> {
  const program = createSayCommand(io)
    .version(getCliVersion(), "-v, --version", "print the ferris-says version")
    .exitOverride()
    .showHelpAfterError();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    // Under exitOverride commander prints usage errors, help and the
    // version itself before throwing.
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }
    writeCliError(toCliError(error));
  }
}

function exitAfter(kind: string): (reason: unknown) => void {
  return (reason) => {
    console.error(`[ferris-says] ${kind}: ${toErrorMessage(reason)}`);
    process.exit(1);
  };
}

if (require.main === module) {
  process.on("uncaughtException", exitAfter("Uncaught exception"));
  process.on("unhandledRejection", exitAfter("Unhandled rejection"));
  void runCli();
}

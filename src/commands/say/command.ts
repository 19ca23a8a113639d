import { say } from "../../say/index.js";
import type { MascotName } from "../../say/mascots.js";
import type { ByteSink } from "../../say/sink.js";

export interface ExecuteSayCommandInput {
  messages: readonly string[];
  width: number;
  mascot: MascotName;
  sink: ByteSink;
}

export interface ExecuteSayCommandResult {
  bubbleCount: number;
}

export function executeSayCommand(
  input: ExecuteSayCommandInput,
): ExecuteSayCommandResult {
  const { messages, width, mascot, sink } = input;

  for (const message of messages) {
    say(message, width, sink, { mascot });
  }

  return { bubbleCount: messages.length };
}

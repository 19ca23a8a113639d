/** An error whose message is shown as is, followed by hint lines. */
export class HintedError extends Error {
  public readonly hints: readonly string[];

  constructor(message: string, hints: readonly string[] = []) {
    super(message);
    this.name = new.target.name;
    this.hints = [...hints];
  }
}

export class ValidationError extends HintedError {}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errnoCode(error: unknown): string | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}

export function isMissing(error: unknown): boolean {
  return errnoCode(error) === "ENOENT";
}

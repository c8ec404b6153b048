export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Playwright raises `TimeoutError` for expired waits and actions. */
export function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && err.name === "TimeoutError";
}

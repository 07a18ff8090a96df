// Pulls a message out of whatever was thrown, so it can be kept as a private message on our own errors.
export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/** Format error for logging */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/** Message text of an error, without the name prefix */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Truncate long text (URLs, browser call logs) for single-line logs */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  const half = Math.floor((maxLength - 3) / 2);
  return `${text.slice(0, half)}...${text.slice(-half)}`;
}

/**
 * Formats an unknown error into a string message.
 * Handles Error instances and falls back to String().
 */
export const formatError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

const ERROR_PREFIX_REGEX = /^Error:\s*/i;
const MAX_ERROR_LENGTH = 100;

/**
 * Formats an error message for a one-line summary:
 * - Strips "Error:" prefix if present
 * - Keeps first line only if multi-line
 * - Truncates to ~100 chars
 */
export const formatErrorLine = (message: string): string => {
  let formatted = message.replace(ERROR_PREFIX_REGEX, "");

  const firstLine = formatted.split("\n")[0];
  if (firstLine) {
    formatted = firstLine;
  }

  if (formatted.length > MAX_ERROR_LENGTH) {
    formatted = `${formatted.slice(0, MAX_ERROR_LENGTH - 3)}...`;
  }

  return formatted.trim();
};

/**
 * Prints a one-line error and exits with code 1.
 */
export const exitWithError = (error: unknown): never => {
  console.error(`✗ ${formatErrorLine(formatError(error))}`);
  process.exit(1);
};

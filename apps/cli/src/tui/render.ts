/**
 * Determines if the update command should show the live TUI.
 *
 * The TUI needs a TTY; --verbose streams raw log lines instead.
 */
export const shouldUseTUI = (
  verbose: boolean,
  stream: { readonly isTTY?: boolean } = process.stdout
): boolean => !verbose && Boolean(stream.isTTY);

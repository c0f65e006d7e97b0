/**
 * CLI palette:
 * - brand: headers and the active section
 * - text: primary content
 * - muted: hints and finished sections
 * - error, warn, success: outcomes
 */

export const colors = {
  brand: "#5B9CF5",
  text: "#FFFFFF",
  muted: "#585858",
  error: "#ff5f5f",
  warn: "#ffaf00",
  success: "#00d787",
} as const;

export type Color = (typeof colors)[keyof typeof colors];

/**
 * Converts a hex color to an ANSI escape code for 24-bit color terminals.
 */
export const hexToAnsi = (hex: string): string => {
  const cleaned = hex.replace("#", "");
  const r = Number.parseInt(cleaned.slice(0, 2), 16);
  const g = Number.parseInt(cleaned.slice(2, 4), 16);
  const b = Number.parseInt(cleaned.slice(4, 6), 16);
  return `\x1b[38;2;${r};${g};${b}m`;
};

export const ANSI_RESET = "\x1b[0m";

/**
 * Wraps text in a color, or returns it unchanged when color is off.
 */
export const paint = (text: string, color: Color, enabled: boolean): string =>
  enabled ? `${hexToAnsi(color)}${text}${ANSI_RESET}` : text;

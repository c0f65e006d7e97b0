import { getVersion } from "../../utils/version.js";
import { ANSI_RESET, colors, hexToAnsi } from "../styles.js";

/**
 * Prints the header line shown before a command's output.
 */
export const printHeader = (command: string): void => {
  console.log();
  console.log(
    `${hexToAnsi(colors.brand)}emergelog v${getVersion()}${ANSI_RESET} ${command}`
  );
  console.log();
};

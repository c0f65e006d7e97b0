import { randomBytes } from "node:crypto";

const RUNID_BYTES = 8;
const RUNID_REGEX = /^[0-9a-f]{16}$/;

/**
 * Creates a 16-character hex run ID for debug log file names.
 */
export const createRunID = (): string =>
  randomBytes(RUNID_BYTES).toString("hex");

export const isValidRunID = (runID: string): boolean => RUNID_REGEX.test(runID);

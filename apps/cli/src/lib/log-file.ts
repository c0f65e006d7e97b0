import { readFileSync } from "node:fs";
import {
  type LogSections,
  splitLogText,
  splitSections,
} from "@emergelog/parser";
import { LogFileNotFoundError } from "./errors.js";

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error ? String(error.code) : undefined;

/**
 * Read a log file as text.
 * Unreadable files raise LogFileNotFoundError with the cause.
 */
export const readLogText = (path: string): string => {
  try {
    return readFileSync(path, "utf-8");
  } catch (error) {
    switch (errorCode(error)) {
      case "ENOENT":
        throw new LogFileNotFoundError(path);
      case "EACCES":
        throw new LogFileNotFoundError(path, "permission denied");
      case "EISDIR":
        throw new LogFileNotFoundError(path, "is a directory");
      default:
        throw new LogFileNotFoundError(
          path,
          error instanceof Error ? error.message : String(error)
        );
    }
  }
};

/**
 * Read a log file and split it into sections.
 */
export const readLogSections = (path: string): LogSections =>
  splitSections(splitLogText(readLogText(path)));

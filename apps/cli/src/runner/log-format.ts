/**
 * Update log line format.
 * Each line is "[DD-Mon-YY HH:MM:SS LEVEL] ::: message", the format the
 * section splitter reads back.
 */

import { LINE_MARKER } from "@emergelog/parser";

export type LogLevel = "INFO" | "ERROR";

const MONTHS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
] as const;

const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * Format a date as "19-Oct-26 03:00:01" in local time.
 */
export const formatLogDate = (date: Date): string => {
  const month = MONTHS[date.getMonth()] ?? "";
  const year = pad(date.getFullYear() % 100);
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${pad(date.getDate())}-${month}-${year} ${time}`;
};

/**
 * Format one log line.
 */
export const formatLogLine = (
  level: LogLevel,
  message: string,
  date: Date
): string => `[${formatLogDate(date)} ${level}]${LINE_MARKER}${message}`;

/**
 * Log file name for a run started at the given time, e.g. "log_2026-10-19-03-00".
 */
export const logFileName = (date: Date): string =>
  `log_${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}-${pad(date.getHours())}-${pad(date.getMinutes())}`;

/**
 * Section splitter for update logs.
 *
 * Log format:
 * - Each logged line is "<preamble> ::: <payload>", where the preamble is the
 *   logger's timestamp and level, e.g. "[19-Oct-26 10:30:45 INFO] ::: text"
 * - A payload like "{{ SYSTEM UPGRADE }}" starts a new section of that name
 * - Lines without the marker (a crash trace, a shell's last words) land in the
 *   single-slot "final" section; only the last one is kept
 */

import type { LogSections } from "./types.js";

/** Separates the logging preamble from the payload */
export const LINE_MARKER = " ::: ";

/** Implicit section before the first header */
export const BEGINNING_SECTION = "beginning";

/** Holds the last line that lacks the marker */
export const FINAL_SECTION = "final";

const SECTION_HEADER_REGEX = /\{\{(.+?)\}\}/;

const LINE_BREAK_REGEX = /\r?\n/;

interface SplitState {
  readonly current: string;
  readonly sections: Map<string, string[]>;
}

/**
 * Check if a payload line is a section header.
 */
export const isSectionHeader = (payload: string): boolean =>
  SECTION_HEADER_REGEX.test(payload);

/**
 * Take the payload of a marked line, or undefined when the line has no marker.
 * Everything after the first marker is kept:
 * "a ::: b ::: c" gives "b ::: c", not "b".
 */
export const extractPayload = (line: string): string | undefined => {
  const idx = line.indexOf(LINE_MARKER);
  if (idx === -1) {
    return undefined;
  }
  return line.slice(idx + LINE_MARKER.length).trim();
};

const step = (state: SplitState, line: string): SplitState => {
  const payload = extractPayload(line);

  if (payload === undefined) {
    state.sections.set(FINAL_SECTION, [line]);
    return state;
  }

  if (isSectionHeader(payload)) {
    // A repeated header continues the existing section
    if (!state.sections.has(payload)) {
      state.sections.set(payload, []);
    }
    return { ...state, current: payload };
  }

  state.sections.get(state.current)?.push(payload);
  return state;
};

/**
 * Split log lines into named sections.
 * The "beginning" section always exists, even when empty.
 * Never throws: unexpected input only yields unexpected section names.
 */
export const splitSections = (lines: readonly string[]): LogSections => {
  const initial: SplitState = {
    current: BEGINNING_SECTION,
    sections: new Map([[BEGINNING_SECTION, []]]),
  };
  return lines.reduce(step, initial).sections;
};

/**
 * Split raw log text into lines.
 * The empty piece after a trailing newline is dropped so it doesn't
 * overwrite the "final" section.
 */
export const splitLogText = (text: string): string[] => {
  if (text === "") {
    return [];
  }
  const lines = text.split(LINE_BREAK_REGEX);
  if (lines.at(-1) === "") {
    lines.pop();
  }
  return lines;
};

/**
 * Get a section's lines, or an empty list when the log has no such section.
 */
export const sectionLines = (
  sections: LogSections,
  name: string
): readonly string[] => sections.get(name) ?? [];

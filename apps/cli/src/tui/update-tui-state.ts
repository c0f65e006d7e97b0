import { isSectionHeader } from "@emergelog/parser";
import type { LogLevel } from "../runner/log-format.js";
import type { UpdateEvent } from "../runner/types.js";

export type SectionStatus = "running" | "done" | "failed";

export interface TrackedSection {
  readonly name: string;
  readonly status: SectionStatus;
  readonly lines: number;
}

export interface UpdateTUIState {
  readonly logPath?: string;
  readonly sections: readonly TrackedSection[];
  readonly lastLine?: { readonly level: LogLevel; readonly message: string };
  readonly errorLines: number;
  readonly done?: {
    readonly exitCode: number;
    readonly duration: number;
    readonly cancelled: boolean;
  };
  readonly errorMessage?: string;
}

export const initialUpdateTUIState: UpdateTUIState = {
  sections: [],
  errorLines: 0,
};

const closeRunning = (
  sections: readonly TrackedSection[],
  status: SectionStatus
): TrackedSection[] =>
  sections.map((section) =>
    section.status === "running" ? { ...section, status } : section
  );

/**
 * Folds one update event into the TUI state.
 * A repeated section header reopens the existing entry; header lines
 * themselves are not counted.
 */
export const reduceUpdateEvent = (
  state: UpdateTUIState,
  event: UpdateEvent
): UpdateTUIState => {
  switch (event.type) {
    case "start":
      return { ...state, logPath: event.logPath };
    case "section": {
      const closed = closeRunning(state.sections, "done");
      const existing = closed.find((s) => s.name === event.name);
      const sections: TrackedSection[] = existing
        ? closed.map((s) =>
            s.name === event.name ? { ...s, status: "running" as const } : s
          )
        : [...closed, { name: event.name, status: "running", lines: 0 }];
      return { ...state, sections };
    }
    case "line": {
      const counted = !isSectionHeader(event.message);
      return {
        ...state,
        sections: counted
          ? state.sections.map((s) =>
              s.status === "running" ? { ...s, lines: s.lines + 1 } : s
            )
          : state.sections,
        lastLine: { level: event.level, message: event.message },
        errorLines: state.errorLines + (event.level === "ERROR" ? 1 : 0),
      };
    }
    case "done":
      return {
        ...state,
        sections: closeRunning(
          state.sections,
          event.exitCode === 0 ? "done" : "failed"
        ),
        done: {
          exitCode: event.exitCode,
          duration: event.duration,
          cancelled: event.cancelled,
        },
      };
    case "error":
      return {
        ...state,
        sections: closeRunning(state.sections, "failed"),
        errorMessage: event.message,
      };
  }
};

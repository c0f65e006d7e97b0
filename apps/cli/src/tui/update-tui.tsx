import { Spinner } from "@inkjs/ui";
import { Box, Text, useApp, useInput } from "ink";
import { useEffect, useReducer, useState } from "react";
import type { UpdateEvent } from "../runner/types.js";
import { formatDuration, formatDurationMs } from "../utils/format.js";
import { colors } from "./styles.js";
import {
  initialUpdateTUIState,
  reduceUpdateEvent,
  type TrackedSection,
} from "./update-tui-state.js";

interface UpdateTUIProps {
  readonly onEvent: (callback: (event: UpdateEvent) => void) => () => void;
  readonly onCancel?: () => void;
}

const MAX_LINE_WIDTH = 72;

const truncate = (text: string): string =>
  text.length > MAX_LINE_WIDTH
    ? `${text.slice(0, MAX_LINE_WIDTH - 3)}...`
    : text;

const SectionLine = ({ section }: { section: TrackedSection }): JSX.Element => {
  const lines = `${section.lines} line${section.lines === 1 ? "" : "s"}`;

  if (section.status === "running") {
    return (
      <Box>
        <Spinner label={section.name} />
        <Text color={colors.muted}> · {lines}</Text>
      </Box>
    );
  }

  const failed = section.status === "failed";
  return (
    <Text>
      <Text color={failed ? colors.error : colors.success}>
        {failed ? "✗" : "✓"}{" "}
      </Text>
      <Text color={failed ? colors.text : colors.muted}>{section.name}</Text>
      <Text color={colors.muted}> · {lines}</Text>
    </Text>
  );
};

/**
 * Live view of an update run: one row per section, the latest output line,
 * and the elapsed time.
 */
export const UpdateTUI = ({ onEvent, onCancel }: UpdateTUIProps): JSX.Element => {
  const { exit } = useApp();
  const [state, dispatch] = useReducer(
    reduceUpdateEvent,
    initialUpdateTUIState
  );
  const [elapsed, setElapsed] = useState(0);

  useInput((input, key) => {
    if (key.ctrl && input === "c") {
      onCancel?.();
      exit();
    }
  });

  useEffect(() => {
    const timer = setInterval(() => {
      setElapsed((prev) => prev + 1);
    }, 1000);

    return () => {
      clearInterval(timer);
    };
  }, []);

  useEffect(() => {
    const unsubscribe = onEvent((event) => {
      dispatch(event);
      if (event.type === "done" || event.type === "error") {
        // Let the final frame render
        setTimeout(() => {
          exit();
        }, 100);
      }
    });

    return unsubscribe;
  }, [onEvent, exit]);

  const finished = state.done !== undefined || state.errorMessage !== undefined;

  return (
    <Box flexDirection="column" marginY={1}>
      {state.sections.length === 0 && !finished ? (
        <Spinner label="Waiting for updater output" />
      ) : null}
      {state.sections.map((section) => (
        <SectionLine key={section.name} section={section} />
      ))}
      {state.lastLine && !finished ? (
        <Text
          color={state.lastLine.level === "ERROR" ? colors.error : colors.muted}
        >
          {"  "}
          {truncate(state.lastLine.message)}
        </Text>
      ) : null}
      {state.errorMessage ? (
        <Text color={colors.error}>✗ {state.errorMessage}</Text>
      ) : null}
      {state.done ? (
        <Text color={state.done.exitCode === 0 ? colors.success : colors.error}>
          {state.done.cancelled
            ? "Cancelled"
            : state.done.exitCode === 0
              ? "Update finished"
              : `Updater exited with code ${state.done.exitCode}`}
          <Text color={colors.muted}>
            {" "}
            in {formatDurationMs(state.done.duration)}
          </Text>
        </Text>
      ) : (
        <Text color={colors.muted}>
          {formatDuration(elapsed)}
          {state.errorLines > 0 ? ` · ${state.errorLines} stderr lines` : ""}
          {" · Ctrl+C to cancel"}
        </Text>
      )}
      {state.logPath ? (
        <Text color={colors.muted}>Log: {state.logPath}</Text>
      ) : null}
    </Box>
  );
};

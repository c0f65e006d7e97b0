/**
 * Turns SIGINT and SIGTERM into an AbortSignal for the update run.
 * The handlers remove themselves once the signal fires.
 */

interface SignalController {
  /** Aborts on the first SIGINT or SIGTERM */
  readonly signal: AbortSignal;
  /** Removes the handlers; call when the run is over */
  readonly cleanup: () => void;
}

export const createSignalController = (): SignalController => {
  const controller = new AbortController();
  let cleaned = false;

  const handleSignal = (): void => {
    if (!(cleaned || controller.signal.aborted)) {
      controller.abort();
    }
  };

  process.on("SIGINT", handleSignal);
  process.on("SIGTERM", handleSignal);

  const cleanup = (): void => {
    if (cleaned) return;
    cleaned = true;
    process.off("SIGINT", handleSignal);
    process.off("SIGTERM", handleSignal);
  };

  controller.signal.addEventListener("abort", cleanup, { once: true });

  return { signal: controller.signal, cleanup };
};

/**
 * Exit code of a cancelled update (128 + SIGINT).
 */
export const SIGINT_EXIT_CODE = 130;

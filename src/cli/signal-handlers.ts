// =============================================================================
// STOP SIGNAL HANDLER
// =============================================================================

export type StopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
};

export type StopSignalHandlerOptions = {
  onSignal?: (signal: NodeJS.Signals) => void;
  signals?: NodeJS.Signals[];
};

/**
 * First SIGINT/SIGTERM aborts the returned signal so no further batches start.
 * A second one falls through to the default handler and ends the process.
 */
export function createRunStopSignalHandler(
  options: StopSignalHandlerOptions = {},
): StopSignalHandler {
  const controller = new AbortController();
  const signals = options.signals ?? ["SIGINT", "SIGTERM"];

  const handler = (signal: NodeJS.Signals): void => {
    cleanup();
    if (controller.signal.aborted) return;
    options.onSignal?.(signal);
    controller.abort({ signal });
  };

  const cleanup = (): void => {
    for (const signal of signals) {
      process.off(signal, handler);
    }
  };

  for (const signal of signals) {
    process.once(signal, handler);
  }

  return {
    signal: controller.signal,
    cleanup,
  };
}

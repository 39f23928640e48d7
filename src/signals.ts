/**
 * Stop signals for the CLI. Workers run in their own process groups, so a
 * terminal Ctrl+C reaches only the orchestrator; it has to stay alive until
 * the workers it started are gone.
 */

export interface SignalTarget {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export const STOP_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export interface AbortOnSignalsOptions {
  signals?: readonly NodeJS.Signals[];
  target?: SignalTarget;
  onSignal?: (signal: NodeJS.Signals, first: boolean) => void;
}

/**
 * Abort `controller` on the first stop signal and absorb any repeats, so the
 * default handler never kills the process mid-cleanup. Returns a function
 * that removes the handlers.
 */
export function abortOnSignals(
  controller: AbortController,
  options: AbortOnSignalsOptions = {},
): () => void {
  const target: SignalTarget = options.target ?? process;
  const handlers = (options.signals ?? STOP_SIGNALS).map((signal) => {
    const handler = (): void => {
      const first = !controller.signal.aborted;
      if (first) {
        controller.abort();
      }
      options.onSignal?.(signal, first);
    };
    target.on(signal, handler);
    return { signal, handler };
  });

  return () => {
    for (const { signal, handler } of handlers) {
      target.off(signal, handler);
    }
  };
}

/**
 * Termination signals end the process at once, without waiting for
 * pending work or log output.
 */
import process from "node:process";

export const SIGNAL_EXIT_CODES = {
  SIGINT: 130,
  SIGTERM: 143,
} as const satisfies Partial<Record<NodeJS.Signals, number>>;

/**
 * Install the handlers. Returns a function that removes them again.
 */
export function installSignalHandlers(
  exit: (code: number) => void = (code) => process.exit(code),
): () => void {
  const handlers = Object.entries(SIGNAL_EXIT_CODES).map(([signal, code]) => {
    const handler = (): void => exit(code);
    process.on(signal, handler);
    return { signal, handler };
  });

  return () => {
    for (const { signal, handler } of handlers) {
      process.off(signal, handler);
    }
  };
}

/**
 * Registers shutdown handlers for SIGINT/SIGTERM.
 * Used by both the api and the worker process.
 */
export function onShutdown(fn: (signal: NodeJS.Signals) => Promise<void> | void) {
  const handler = async (signal: NodeJS.Signals) => {
    try {
      await fn(signal);
    } finally {
      // Ensure the process exits after cleanup
      process.exit(0);
    }
  };

  process.once("SIGINT", handler);
  process.once("SIGTERM", handler);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

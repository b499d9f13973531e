/**
 * Interrupt Signal
 *
 * Cooperative cancellation for the poll loop. The CLI sets it when the
 * user quits; the poller checks it between cycles, never mid-request.
 */

export interface InterruptSignal {
  readonly interrupted: boolean;
  interrupt(): void;
  reset(): void;
  /**
   * Register a listener fired on the next interrupt().
   * Returns a function that unregisters it.
   */
  onInterrupt(listener: () => void): () => void;
}

/**
 * Create an interrupt signal.
 *
 * @example
 * ```typescript
 * const signal = createInterruptSignal();
 *
 * // In the CLI (e.g., on Ctrl+C)
 * signal.interrupt();
 *
 * // In the poll loop
 * if (signal.interrupted) {
 *   throw new InterruptError();
 * }
 * ```
 */
export function createInterruptSignal(): InterruptSignal {
  let interrupted = false;
  const listeners = new Set<() => void>();

  return {
    get interrupted(): boolean {
      return interrupted;
    },

    interrupt(): void {
      if (interrupted) {
        return;
      }
      interrupted = true;
      for (const listener of [...listeners]) {
        listener();
      }
    },

    reset(): void {
      interrupted = false;
    },

    onInterrupt(listener: () => void): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}

/**
 * Error thrown when polling stops because of an interrupt.
 */
export class InterruptError extends Error {
  constructor(message: string = "Polling interrupted") {
    super(message);
    this.name = "InterruptError";
  }
}

export function isInterruptError(error: unknown): error is InterruptError {
  return error instanceof InterruptError;
}

/**
 * Sleep for `ms`, waking early if `signal` is interrupted.
 */
export function sleep(ms: number, signal?: InterruptSignal): Promise<void> {
  if (signal?.interrupted) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    let unsubscribe: (() => void) | undefined;
    const timer = setTimeout(() => {
      unsubscribe?.();
      resolve();
    }, ms);
    unsubscribe = signal?.onInterrupt(() => {
      clearTimeout(timer);
      unsubscribe?.();
      resolve();
    });
  });
}

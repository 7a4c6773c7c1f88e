/**
 * Teardown for the entry points
 *
 * The status command parks its spinner here while checks run, so that
 * Ctrl+C or a fatal error does not leave a half-drawn spinner line on
 * stderr. Registered callbacks run newest first, at most once per process.
 */

export type CleanupCallback = () => void;

const pending = new Set<CleanupCallback>();
let finished = false;

/**
 * @returns a function that withdraws the callback once its work is done
 */
export function registerCleanup(fn: CleanupCallback): () => void {
  pending.add(fn);
  return () => {
    pending.delete(fn);
  };
}

/**
 * Run and forget every pending callback. A throwing callback does not stop
 * the others; what it threw is returned for the error handler to report.
 */
export function runCleanup(): unknown[] {
  if (finished) return [];
  finished = true;

  const callbacks = [...pending].reverse();
  pending.clear();

  return callbacks.flatMap((callback) => {
    try {
      callback();
      return [];
    } catch (error) {
      return [error];
    }
  });
}

/** Reset between tests */
export function clearCleanup(): void {
  pending.clear();
  finished = false;
}

export function getCleanupCount(): number {
  return pending.size;
}

export const SIGINT_REASON = "Interrupted by user (SIGINT)"

export class CancellationError extends Error {
  constructor(message = "Run cancelled") {
    super(message)
    this.name = "CancellationError"
  }
}

/**
 * Aborts the run. The reason is a `CancellationError` because `fetch` rejects
 * an in-flight request with the signal's reason as-is.
 */
export const cancelRun = (controller: AbortController, message = SIGINT_REASON): void => {
  controller.abort(new CancellationError(message))
}

export const throwIfAborted = (signal: AbortSignal | undefined): void => {
  if (!signal?.aborted) {
    return
  }
  const reason: unknown = signal.reason
  throw reason instanceof CancellationError ? reason : new CancellationError()
}

/** True for the run's own abort reason, and for the `AbortError` of other abort paths. */
export const isCancellationError = (value: unknown, signal?: AbortSignal): boolean => {
  if (value instanceof CancellationError) {
    return true
  }
  if (signal?.aborted && value === signal.reason) {
    return true
  }
  return value instanceof Error && value.name === "AbortError"
}

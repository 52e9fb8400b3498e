export interface TimeoutScope {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * Aborts after `timeoutMs` with the error from `onTimeout`, or earlier when
 * `parent` aborts. Callers must `dispose()` once the guarded call settles.
 */
export function timeoutScope(timeoutMs: number, onTimeout: () => Error, parent?: AbortSignal): TimeoutScope {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(onTimeout());
  }, timeoutMs);
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }
  return {
    signal: controller.signal,
    dispose() {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    }
  };
}

/** The abort reason when the signal fired, otherwise the error that surfaced. */
export function abortReason(signal: AbortSignal, fallback: unknown): unknown {
  return signal.aborted && signal.reason !== undefined ? signal.reason : fallback;
}

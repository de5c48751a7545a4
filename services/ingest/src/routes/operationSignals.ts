export type ClosableResponse = {
  readonly writableFinished: boolean;
  once(event: 'close', listener: () => void): unknown;
  off(event: 'close', listener: () => void): unknown;
};

export type TrackedOperation = {
  signal: AbortSignal;
  release(): void;
};

/**
 * Hands each lifecycle request an AbortSignal. The signal fires when the
 * client goes away before the response was written, or when the app shuts
 * down while the operation is still running.
 */
export function createOperationSignals() {
  const inflight = new Set<AbortController>();

  function track(response: ClosableResponse): TrackedOperation {
    const controller = new AbortController();
    const onClose = () => {
      if (!response.writableFinished) {
        controller.abort(new Error('client disconnected'));
      }
    };
    response.once('close', onClose);
    inflight.add(controller);

    return {
      signal: controller.signal,
      release() {
        inflight.delete(controller);
        response.off('close', onClose);
      }
    };
  }

  function abortAll(reason: string): number {
    const count = inflight.size;
    for (const controller of inflight) {
      controller.abort(new Error(reason));
    }
    inflight.clear();
    return count;
  }

  return { track, abortAll };
}

export type OperationSignals = ReturnType<typeof createOperationSignals>;

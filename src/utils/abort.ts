/**
 * Lets one caller stop waiting on a promise that others may share, without
 * cancelling the underlying work.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });

    void promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Controller that aborts when `parent` does, and can also be aborted on its
 * own. Call `release()` once done to detach from the parent.
 */
export function linkedController(parent?: AbortSignal): {
  controller: AbortController;
  release: () => void;
} {
  const controller = new AbortController();

  if (!parent) {
    return { controller, release: () => undefined };
  }
  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, release: () => undefined };
  }

  const onAbort = (): void => controller.abort(parent.reason);
  parent.addEventListener("abort", onAbort, { once: true });

  return {
    controller,
    release: () => parent.removeEventListener("abort", onAbort),
  };
}

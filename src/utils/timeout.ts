export class AbortedError extends Error {
  constructor(public readonly reason: unknown) {
    super(reason instanceof Error ? reason.message : 'Operation aborted');
    this.name = 'AbortedError';
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError(signal.reason));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settles with `promise`, or rejects with AbortedError as soon as `signal` aborts,
 * whichever comes first. The underlying work is not stopped; callers pass the same
 * signal down so well-behaved dependencies stop on their own.
 */
export function raceWithSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new AbortedError(signal.reason));

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new AbortedError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export interface LinkedController {
  controller: AbortController;
  dispose(): void;
}

/** An AbortController that also aborts when any of `parents` does. */
export function linkedController(...parents: Array<AbortSignal | undefined>): LinkedController {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const parent of parents) {
    if (!parent) continue;
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const forward = () => controller.abort(parent.reason);
    parent.addEventListener('abort', forward, { once: true });
    cleanups.push(() => parent.removeEventListener('abort', forward));
  }

  return {
    controller,
    dispose: () => {
      for (const cleanup of cleanups) cleanup();
    },
  };
}

export interface AttemptScope {
  signal: AbortSignal;
  /** True when the attempt's own timer fired, as opposed to an upstream abort. */
  timedOut(): boolean;
  dispose(): void;
}

/** Bounds a single remote attempt by `timeoutMs` while following the upstream signal. */
export function attemptScope(timeoutMs: number, upstream?: AbortSignal): AttemptScope {
  const linked = linkedController(upstream);
  let fired = false;
  const timer = setTimeout(() => {
    fired = true;
    linked.controller.abort(new Error(`Attempt timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  return {
    signal: linked.controller.signal,
    timedOut: () => fired && !upstream?.aborted,
    dispose: () => {
      clearTimeout(timer);
      linked.dispose();
    },
  };
}

/**
 * Returned instead of a result when a throttled operation was skipped. It means "no new data",
 * never a failure.
 */
export const THROTTLED = Symbol('blink.throttled');
export type Throttled = typeof THROTTLED;

export const isThrottled = <T>(value: T | Throttled): value is Throttled => value === THROTTLED;

export type ThrottledOperation<O extends object, A extends unknown[], R> = {
  (owner: O, ...args: A): Promise<R | Throttled>;
  /** Invokes the operation regardless of when it last ran. */
  force: (owner: O, ...args: A) => Promise<R>;
};

/**
 * Gates `operation` so that it runs at most once per interval for each owner. The last-call time
 * lives in a map keyed by owner, one map per wrapped operation, so two clients never throttle each
 * other and two operations on the same client never share a gate.
 */
export const throttle = <O extends object, A extends unknown[], R>(
  interval: number | ((owner: O) => number),
  operation: (owner: O, ...args: A) => Promise<R>
): ThrottledOperation<O, A, R> => {
  const lastCalls = new WeakMap<O, number>();

  const invoke = (owner: O, args: A) => {
    lastCalls.set(owner, Date.now());
    return operation(owner, ...args);
  };

  const throttled = async (owner: O, ...args: A): Promise<R | Throttled> => {
    const intervalMs = typeof interval === 'number' ? interval : interval(owner);
    const lastCall = lastCalls.get(owner);

    if (lastCall !== undefined && Date.now() - lastCall < intervalMs) {
      return THROTTLED;
    }

    return invoke(owner, args);
  };

  return Object.assign(throttled, {
    force: async (owner: O, ...args: A) => invoke(owner, args)
  });
};

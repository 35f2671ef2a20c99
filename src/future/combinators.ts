import { FutureCancelled, IllegalArgumentsError, TimeoutError } from "../errors";
import { getSettings } from "../config";
import { toMilliseconds, WaitPeriod } from "../utils/period";
import { Future } from "./future";
import { resolved } from "./construct";
import { FutureEngine } from "./protocols";

type Values<T extends readonly unknown[]> = { -readonly [K in keyof T]: T[K] extends PromiseLike<infer V> ? V : T[K] };

export type SettledOutcome<T> = { status: "fulfilled"; value: T } | { status: "rejected"; reason: unknown };

/**
 * Engine of the first future among the inputs. Combinators build their result on it
 */
const engineOf = (inputs: readonly unknown[]): FutureEngine | undefined => {
  for (const input of inputs) {
    if (input instanceof Future) return input.engine;
  }
  return undefined;
};

/**
 * Wraps a value in a future, on the engine of the value itself when it is a future
 */
const adopt = <T>(value: T | PromiseLike<T>, engine?: FutureEngine) =>
  resolved(value, value instanceof Future ? value.engine : engine);

function collect<T>(futures: ReadonlyArray<T | PromiseLike<T>>): Future<T[]> {
  const engine = engineOf(futures);

  return new Future<T[]>((resolve, reject) => {
    const values = new Array<T>(futures.length);
    let remaining = futures.length;
    if (remaining === 0) {
      resolve(values);
      return;
    }

    futures.forEach((future, index) => {
      adopt(future, engine).subscribe((value) => {
        values[index] = value;
        remaining -= 1;
        if (remaining === 0) resolve(values);
      }, reject);
    });
  }, engine);
}

/**
 * Awaits all futures and collects their values in input order. Fails with the first failure, the remaining futures
 * keep running but their outcomes are discarded
 * @param futures futures, promises or plain values
 */
export function all<T extends readonly unknown[] | []>(futures: readonly [...T]): Future<Values<T>>;
export function all(futures: readonly unknown[]): Future<unknown[]> {
  return collect(futures);
}

/**
 * Awaits every future, whether it completes or fails, and describes each outcome in input order
 * @param futures
 */
export function allSettled<T>(futures: ReadonlyArray<T | PromiseLike<T>>): Future<Array<SettledOutcome<T>>> {
  const engine = engineOf(futures);

  return collect<SettledOutcome<T>>(
    futures.map((future) =>
      adopt(future, engine).then<SettledOutcome<T>, SettledOutcome<T>>(
        (value) => ({ status: "fulfilled", value }),
        (reason) => ({ status: "rejected", reason })
      )
    )
  );
}

/**
 * Returns the value of the first future to complete. Fails with an AggregateError, listing every reason in input
 * order, only if all of them fail
 * @param futures
 */
export function any<T>(futures: ReadonlyArray<T | PromiseLike<T>>): Future<T> {
  return quorum(1, futures).then(([value]) => value);
}

/**
 * Returns the values of the first `n` futures to complete, in arrival order. Fails with an AggregateError once
 * enough futures failed that `n` completions can no longer be reached
 * @param n
 * @param futures
 */
export function quorum<T>(n: number, futures: ReadonlyArray<T | PromiseLike<T>>): Future<T[]> {
  const engine = engineOf(futures);

  return new Future<T[]>((resolve, reject) => {
    if (!Number.isInteger(n) || n < 0) {
      reject(new IllegalArgumentsError([n], `Quorum must be a non-negative integer, received ${n}`));
      return;
    }

    const values: T[] = [];
    const reasons = new Array<unknown>(futures.length);
    const tolerated = futures.length - n;
    let failures = 0;
    const unreachable = () =>
      reject(new AggregateError(Object.values(reasons), `Quorum of ${n} unreachable with ${futures.length} futures`));

    if (n === 0) {
      resolve([]);
    } else if (tolerated < 0) {
      unreachable();
    }

    futures.forEach((future, index) => {
      adopt(future, engine).subscribe(
        (value) => {
          values.push(value);
          if (values.length === n) resolve(values.slice());
        },
        (reason) => {
          reasons[index] = reason;
          failures += 1;
          if (failures > tolerated) unreachable();
        }
      );
    });
  }, engine);
}

/**
 * Like then(), but the array the future completes with is spread over the callback's arguments
 * @param future
 * @param callback
 */
export const spreadThen = <T extends readonly unknown[], K>(
  future: T | PromiseLike<T>,
  callback: (...args: T) => K | PromiseLike<K>
) => adopt(future).then<K>((values) => callback(...values));

/**
 * Adopts the outcome of the future if it settles within the period. Otherwise fails with a TimeoutError, or
 * completes with the fallback if one was given. The future itself is not stopped, its late outcome is discarded
 * @param future
 * @param period wait period object or the number of milliseconds to wait
 * @param fallback
 */
export function timeout<T, F = never>(
  future: T | PromiseLike<T>,
  period: WaitPeriod | number,
  ...fallback: [] | [F]
): Future<T | F> {
  const milliseconds = toMilliseconds(period);
  const source = adopt(future);

  return new Future<T | F>((resolve, reject) => {
    const timer = setTimeout(() => {
      getSettings().logger.debug(`Future ${source.id} timed out after ${milliseconds}ms`);
      if (fallback.length === 1) {
        resolve(fallback[0]);
      } else {
        reject(new TimeoutError(milliseconds));
      }
    }, milliseconds);

    source.subscribe(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (reason) => {
        clearTimeout(timer);
        reject(reason);
      }
    );
  }, source.engine);
}

/**
 * Completes with the given value once the period elapsed. Fails with FutureCancelled if the signal aborts first
 * @param period wait period object or the number of milliseconds to wait
 * @param value
 * @param signal
 * @param engine
 */
export function delay(period: WaitPeriod | number): Future<undefined>;
export function delay<T>(period: WaitPeriod | number, value: T, signal?: AbortSignal, engine?: FutureEngine): Future<T>;
export function delay(
  period: WaitPeriod | number,
  value?: unknown,
  signal?: AbortSignal,
  engine?: FutureEngine
): Future<unknown> {
  return new Future<unknown>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new FutureCancelled());
      return;
    }

    const abort = () => {
      clearTimeout(timer);
      reject(new FutureCancelled());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", abort);
      resolve(value);
    }, toMilliseconds(period));
    signal?.addEventListener("abort", abort, { once: true });
  }, engine);
}

/**
 * Adopts the outcome of the future unless the signal aborts first, in which case it fails with the signal's reason
 * @param future
 * @param signal
 */
export function withSignal<T>(future: T | PromiseLike<T>, signal: AbortSignal): Future<T> {
  const source = adopt(future);

  return new Future<T>((resolve, reject) => {
    const abort = () => reject(signal.reason);
    const detach = () => signal.removeEventListener("abort", abort);
    if (signal.aborted) {
      abort();
    } else {
      signal.addEventListener("abort", abort, { once: true });
    }
    source.subscribe(
      (value) => {
        detach();
        resolve(value);
      },
      (reason) => {
        detach();
        reject(reason);
      }
    );
  }, source.engine);
}

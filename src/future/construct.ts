import { Executor, Future } from "./future";
import { FutureEngine } from "./protocols";

/**
 * Returns a future fulfilled with the given value
 * @param value
 * @param engine
 */
export const resolved = <T>(value: T | PromiseLike<T>, engine?: FutureEngine) => Future.completed(value, engine);

/**
 * Returns a future rejected with the given reason
 * @param reason
 * @param engine
 */
export const rejected = <T = never>(reason: unknown, engine?: FutureEngine) => Future.exceptionally<T>(reason, engine);

/**
 * Returns a pending future driven by the given computation
 * @param executor
 * @param engine
 */
export const computed = <T>(executor: Executor<T>, engine?: FutureEngine) => Future.of(executor, engine);

const isExecutor = (value: unknown): value is Executor<unknown> => typeof value === "function";

/**
 * Convenience constructor that picks one of the constructors above from the shape of its argument: functions are
 * run as executors, errors produce a failed future and anything else a completed one
 * @param value
 */
export function futureOf<T>(value: Executor<T>): Future<T>;
export function futureOf(value: Error): Future<never>;
export function futureOf<T>(value: T | PromiseLike<T>): Future<T>;
export function futureOf(value: unknown): Future<unknown> {
  if (isExecutor(value)) {
    return computed(value);
  }
  if (value instanceof Error) {
    return rejected(value);
  }
  return resolved(value);
}

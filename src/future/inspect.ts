import * as R from "ramda";
import { FailureFilter, FutureValue, Handler, State } from "./protocols";

const CAPABILITIES = [
  "then",
  "catchAll",
  "catchByKind",
  "finally",
  "isFulfilled",
  "isRejected",
  "isPending",
  "getValue",
  "getReason",
  "cancel",
] as const;

/**
 * Returns true if the value implements every future capability
 * @param value
 */
export function isFutureValue<T = unknown>(value: unknown): value is FutureValue<T> {
  if (typeof value !== "object" || value === null) return false;
  return R.all((capability) => typeof Reflect.get(value, capability) === "function", CAPABILITIES);
}

export const isFulfilled = (future: State<unknown>) => future.isFulfilled();

export const isResolved = isFulfilled;

export const isRejected = (future: State<unknown>) => future.isRejected();

export const isPending = (future: State<unknown>) => future.isPending();

export const isDone = (future: State<unknown>) => !future.isPending();

/**
 * Fulfillment value of the future. Throws an IllegalStateError if it isn't fulfilled
 * @param future
 */
export const getValue = <T>(future: State<T>) => future.getValue();

/**
 * Rejection reason of the future. Throws an IllegalStateError if it isn't rejected
 * @param future
 */
export const getReason = (future: State<unknown>) => future.getReason();

export const thenApply = <T, R>(future: FutureValue<T>, callback: Handler<T, R>) => future.then(callback);

export const catchAll = <T, R>(future: FutureValue<T>, callback: Handler<unknown, R>) => future.catchAll(callback);

export const catchByKind = <T, E = unknown, R = never>(
  future: FutureValue<T>,
  filter: FailureFilter<E>,
  callback: Handler<E, R>
) => future.catchByKind(filter, callback);

/**
 * Handles failures reported through the callback of a callback-style function
 * @param future
 * @param callback
 */
export const catchOperational = <T, R>(future: FutureValue<T>, callback: Handler<unknown, R>) =>
  future.catchByKind("operational", callback);

/**
 * Function form of finally()
 * @param future
 * @param callback
 */
export const always = <T>(future: FutureValue<T>, callback: () => unknown) => future.finally(callback);

import * as R from "ramda";
import { OperationalError } from "../errors";
import { getSettings } from "../config";
import { Future } from "./future";

export type Callback<T> = (value: T) => void;

export type NodeCallback<T> = (error: unknown, value?: T) => void;

const warnRepeatedCall = (name: string) =>
  getSettings().logger.warn(`Callback of ${name || "anonymous function"} invoked more than once, ignoring`);

/**
 * Given a function that accepts a callback as its last argument, returns a function that returns a future instead.
 * The future completes with whatever value the callback receives
 * @param fn
 */
export function fromCallback<A extends unknown[], T>(fn: (...args: [...A, Callback<T>]) => void) {
  return (...args: A) =>
    new Future<T>((resolve) => {
      let called = false;
      fn(...args, (value: T) => {
        if (called) {
          warnRepeatedCall(fn.name);
          return;
        }
        called = true;
        resolve(value);
      });
    });
}

/**
 * Like fromCallback(), for functions whose callback receives an error first. A reported error fails the future
 * with an OperationalError that keeps the error as its cause
 * @param fn
 */
export function fromNodeCallback<A extends unknown[], T>(fn: (...args: [...A, NodeCallback<T>]) => void) {
  return (...args: A) =>
    new Future<T | undefined>((resolve, reject) => {
      let called = false;
      fn(...args, (error: unknown, value?: T) => {
        if (called) {
          warnRepeatedCall(fn.name);
          return;
        }
        called = true;
        if (R.isNil(error)) {
          resolve(value);
        } else {
          reject(new OperationalError(error));
        }
      });
    });
}

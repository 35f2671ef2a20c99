import * as R from "ramda";
import { v4 as uuid } from "uuid";
import { FutureCancelled, IllegalStateError } from "../errors";
import { getSettings } from "../config";
import { Chain, EngineCell, FailureFilter, FutureEngine, FutureValue, Handler } from "./protocols";

export type Resolve<T> = (value: T | PromiseLike<T>) => void;
export type Reject = (reason?: unknown) => void;
export type Executor<T> = (resolve: Resolve<T>, reject: Reject) => void;

type Settlement<T> = { status: "fulfilled"; value: T } | { status: "rejected"; reason: unknown };

export function isThenable<T>(value: T | PromiseLike<T>): value is PromiseLike<T> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

const invoke = <R>(callback: () => R | PromiseLike<R>, resolve: Resolve<R>, reject: Reject) => {
  try {
    resolve(callback());
  } catch (error: unknown) {
    reject(error);
  }
};

/**
 * Represents an eventual result of some asynchronous operation, adapted onto a {@link FutureEngine}. Settlement is
 * recorded synchronously so the future's state can be inspected at any time, while callbacks are delivered by the
 * engine. Futures are **Thenable** objects and can be awaited
 */
export class Future<T> implements FutureValue<T> {
  readonly engine: FutureEngine;

  private readonly guid: string;

  private readonly cell: EngineCell<T>;

  private settlement?: Settlement<T>;

  /**
   * @param executor computation driving the future. It receives resolve and reject callbacks, only the first call
   * of either takes effect
   * @param engine engine providing the settlement cell. Defaults to the configured engine
   */
  constructor(executor: Executor<T>, engine: FutureEngine = getSettings().engine) {
    this.guid = uuid();
    this.engine = engine;
    this.cell = engine.cell<T>();

    let locked = false;
    const resolve: Resolve<T> = (value) => {
      if (locked) return;
      locked = true;
      this.adopt(value);
    };
    const reject: Reject = (reason) => {
      if (locked) return;
      locked = true;
      this.settle({ status: "rejected", reason });
    };

    try {
      executor(resolve, reject);
    } catch (error: unknown) {
      reject(error);
    }
  }

  /**
   * Creates a future driven by the given executor
   * @param executor
   * @param engine
   */
  public static of<K>(executor: Executor<K>, engine?: FutureEngine) {
    return new Future<K>(executor, engine);
  }

  /**
   * Returns a future that completes with the given value. Thenables are adopted, the future stays pending until they
   * settle
   * @param value
   * @param engine
   */
  public static completed<K>(value: K | PromiseLike<K>, engine?: FutureEngine) {
    return new Future<K>((resolve) => resolve(value), engine);
  }

  /**
   * Returns a future that fails with the given reason
   * @param reason
   * @param engine
   */
  public static exceptionally<K = never>(reason: unknown, engine?: FutureEngine) {
    return new Future<K>((_, reject) => reject(reason), engine);
  }

  /**
   * Unique ID of the future
   */
  get id() {
    return this.guid;
  }

  isFulfilled() {
    return this.settlement?.status === "fulfilled";
  }

  isRejected() {
    return this.settlement?.status === "rejected";
  }

  isPending() {
    return this.settlement === undefined;
  }

  getValue(): T {
    const settlement = this.settlement;
    if (settlement === undefined || settlement.status !== "fulfilled") {
      throw new IllegalStateError(`Future ${this.guid} is not fulfilled`);
    }
    return settlement.value;
  }

  getReason(): unknown {
    const settlement = this.settlement;
    if (settlement === undefined || settlement.status !== "rejected") {
      throw new IllegalStateError(`Future ${this.guid} is not rejected`);
    }
    return settlement.reason;
  }

  /**
   * Cancels the future if it is still pending. Whatever was computing its result keeps running, but the result is
   * discarded
   */
  cancel() {
    return this.settle({ status: "rejected", reason: new FutureCancelled() });
  }

  /**
   * Registers callbacks for the settlement of this future without creating a new one
   * @param onFulfilled
   * @param onRejected
   */
  subscribe(onFulfilled: (value: T) => void, onRejected: (reason: unknown) => void) {
    this.cell.subscribe(onFulfilled, onRejected);
  }

  /**
   * Chains a step to be executed once the future fulfills. Returns a new future for the outcome of the step. A missing
   * handler passes the outcome through, as with any thenable
   * @param onFulfilled
   * @param onRejected
   */
  then<R1 = T, R2 = never>(
    onFulfilled?: Handler<T, R1> | null,
    onRejected?: Handler<unknown, R2> | null
  ): Future<R1 | R2>;
  then(onFulfilled?: Handler<T, unknown> | null, onRejected?: Handler<unknown, unknown> | null): Future<unknown> {
    return new Future<unknown>((resolve, reject) => {
      this.cell.subscribe(
        (value) =>
          typeof onFulfilled === "function" ? invoke(() => onFulfilled(value), resolve, reject) : resolve(value),
        (reason) =>
          typeof onRejected === "function" ? invoke(() => onRejected(reason), resolve, reject) : reject(reason)
      );
    }, this.engine);
  }

  /**
   * Handles any failure that occurred in the previous steps
   * @param onRejected
   */
  catchAll<R>(onRejected: Handler<unknown, R>): Future<T | R> {
    return this.then<T, R>((value) => value, onRejected);
  }

  /**
   * Handles failures of the given kind, or instances of the given error class. Other failures pass through unchanged
   * @param filter
   * @param onRejected
   */
  catchByKind<E = unknown, R = never>(filter: FailureFilter<E>, onRejected: Handler<E, R>): Future<T | R> {
    return this.then<T, R>(
      (value) => value,
      (reason) => {
        if (this.matches(reason, filter)) {
          return onRejected(reason);
        }
        throw reason;
      }
    );
  }

  /**
   * Runs the callback irrespective of the future completing or failing, then passes the outcome on
   * @param onSettled
   */
  finally(onSettled: () => unknown): Future<T> {
    const after = <K>(outcome: () => K) =>
      new Future<unknown>((resolve) => resolve(onSettled()), this.engine).then<K>(outcome);

    return this.then<T, never>(
      (value) => after(() => value),
      (reason) =>
        after((): never => {
          throw reason;
        })
    );
  }

  private matches<E>(reason: unknown, filter: FailureFilter<E>): reason is E {
    if (typeof filter === "string") {
      return filter === "generic" || this.engine.classify(reason) === filter;
    }
    return reason instanceof filter;
  }

  private adopt(value: T | PromiseLike<T>) {
    if (value === this) {
      this.settle({ status: "rejected", reason: new TypeError("A future cannot be resolved with itself") });
      return;
    }
    if (!isThenable(value)) {
      this.settle({ status: "fulfilled", value });
      return;
    }

    const first = R.once((step: () => void) => step());
    try {
      value.then(
        (inner) => first(() => this.adopt(inner)),
        (reason: unknown) => first(() => this.settle({ status: "rejected", reason }))
      );
    } catch (error: unknown) {
      first(() => this.settle({ status: "rejected", reason: error }));
    }
  }

  private settle(settlement: Settlement<T>) {
    if (this.settlement) return false;

    this.settlement = settlement;
    if (settlement.status === "fulfilled") {
      this.cell.resolve(settlement.value);
    } else {
      this.cell.reject(settlement.reason);
    }
    return true;
  }
}

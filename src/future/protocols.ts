/**
 * Abstract classification of a rejection. Handlers registered with `catchByKind` dispatch on these kinds, whatever
 * engine produced the failure
 */
export type FailureKind = "generic" | "timeout" | "cancellation" | "operational";

/**
 * An error class that rejections can be matched against with `instanceof`
 */
export type ErrorClass<E> = abstract new (...args: never[]) => E;

export type FailureFilter<E = unknown> = FailureKind | ErrorClass<E>;

export type Handler<A, R> = (value: A) => R | PromiseLike<R>;

/**
 * Callback registration on a future value. Callbacks are always invoked on a later turn, never on the stack frame
 * that registered them
 */
export interface Chain<T> {
  then<R1 = T, R2 = never>(
    onFulfilled?: Handler<T, R1> | null,
    onRejected?: Handler<unknown, R2> | null
  ): FutureValue<R1 | R2>;

  catchAll<R>(onRejected: Handler<unknown, R>): FutureValue<T | R>;

  catchByKind<E = unknown, R = never>(filter: FailureFilter<E>, onRejected: Handler<E, R>): FutureValue<T | R>;

  finally(onSettled: () => unknown): FutureValue<T>;
}

/**
 * Synchronous, repeatable inspection of a future value's settlement
 */
export interface State<T> {
  isFulfilled(): boolean;

  isRejected(): boolean;

  isPending(): boolean;

  /**
   * Fulfillment value. Throws if the future is not fulfilled
   */
  getValue(): T;

  /**
   * Rejection reason. Throws if the future is not rejected
   */
  getReason(): unknown;
}

export interface Cancellable {
  /**
   * Rejects a pending future with a cancellation failure. Returns false if the future had already settled
   */
  cancel(): boolean;
}

/**
 * The full capability set a type implements to take part in generic future composition
 */
export type FutureValue<T> = Chain<T> & State<T> & Cancellable;

/**
 * Single-assignment settlement cell provided by an engine. Only the first resolve/reject call takes effect
 */
export interface EngineCell<T> {
  resolve(value: T): void;

  reject(reason: unknown): void;

  /**
   * Schedules the callbacks to run once the cell settles, in registration order. Never runs them synchronously
   */
  subscribe(onFulfilled: (value: T) => void, onRejected: (reason: unknown) => void): void;
}

export interface FutureEngine {
  readonly name: string;

  cell<T>(): EngineCell<T>;

  classify(reason: unknown): FailureKind;
}

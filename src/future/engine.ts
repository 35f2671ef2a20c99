import { FutureCancelled, OperationalError, TimeoutError } from "../errors";
import { EngineCell, FailureKind, FutureEngine } from "./protocols";

// Platform errors (DOMException) may come from another realm, so they are matched by name only
const hasErrorName = (reason: unknown, name: string) =>
  typeof reason === "object" && reason !== null && "name" in reason && reason.name === name;

/**
 * Settlement cell backed by a native Promise
 */
class NativeCell<T> implements EngineCell<T> {
  private readonly promise: Promise<T>;

  private resolver: (value: T) => void = () => {};

  private rejecter: (reason: unknown) => void = () => {};

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolver = resolve;
      this.rejecter = reject;
    });
  }

  resolve(value: T) {
    this.resolver(value);
  }

  reject(reason: unknown) {
    this.rejecter(reason);
  }

  subscribe(onFulfilled: (value: T) => void, onRejected: (reason: unknown) => void) {
    void this.promise.then(onFulfilled, onRejected);
  }
}

/**
 * Engine binding onto the runtime's native Promise. Abort and timeout failures raised by the platform
 * (AbortSignal.abort(), AbortSignal.timeout()) are classified alongside the library's own errors
 */
export const nativeEngine: FutureEngine = {
  name: "native",

  cell<T>(): EngineCell<T> {
    return new NativeCell<T>();
  },

  classify(reason: unknown): FailureKind {
    if (reason instanceof TimeoutError || hasErrorName(reason, "TimeoutError")) {
      return "timeout";
    }
    if (reason instanceof FutureCancelled || hasErrorName(reason, "AbortError")) {
      return "cancellation";
    }
    if (reason instanceof OperationalError) {
      return "operational";
    }
    return "generic";
  },
};

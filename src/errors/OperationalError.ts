import { FutureError } from "./FutureError";

/**
 * Thrown when a callback-style function reports an error through its callback. The reported error is kept as the
 * cause
 */
export class OperationalError extends FutureError {
  constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
  }
}

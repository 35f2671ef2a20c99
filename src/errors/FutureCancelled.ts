import { FutureError } from "./FutureError";

/**
 * Error thrown when a future is cancelled
 */
export class FutureCancelled extends FutureError {
  constructor(message = "Future was cancelled") {
    super(message);
  }
}

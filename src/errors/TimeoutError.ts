import { FutureError } from "./FutureError";

/**
 * Thrown to indicate that some timed operation has exceeded the maximum duration
 */
export class TimeoutError extends FutureError {
  readonly milliseconds?: number;

  constructor(milliseconds?: number) {
    super(milliseconds === undefined ? "Operation timed out" : `Operation timed out after ${milliseconds}ms`);
    this.milliseconds = milliseconds;
  }
}

/**
 * Thrown when an operation is invoked on an object that is not in the right state for it
 */
export class IllegalStateError extends Error {}

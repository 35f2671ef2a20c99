/**
 * Any type of error raised from a future
 */
export class FutureError extends Error {}

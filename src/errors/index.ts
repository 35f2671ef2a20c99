export * from "./FutureError";
export * from "./FutureCancelled";
export * from "./TimeoutError";
export * from "./OperationalError";
export * from "./IllegalStateError";
export * from "./IllegalArgumentsError";

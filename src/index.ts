export * from "./future";
export * from "./algebra";
export * from "./errors";
export * from "./config";
export { toMilliseconds } from "./utils/period";
export type { WaitPeriod } from "./utils/period";

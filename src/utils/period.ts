/**
 * Duration to wait for something to occur
 */
export interface WaitPeriod {
  minutes?: number;
  seconds?: number;
  milliseconds?: number;
  hours?: number;
}

/**
 * Converts a wait period to milliseconds. A number is already a count of milliseconds
 * @param period
 */
export const toMilliseconds = (period: WaitPeriod | number) =>
  typeof period === "number"
    ? period
    : (period.hours ?? 0) * 60 * 60 * 1000 +
      (period.minutes ?? 0) * 60 * 1000 +
      (period.seconds ?? 0) * 1000 +
      (period.milliseconds ?? 0);

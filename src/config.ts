import { nativeEngine } from "./future/engine";
import { FutureEngine } from "./future/protocols";

export type Logger = Pick<Console, "warn" | "debug">;

export interface Settings {
  /**
   * Engine that new futures are created on, unless one is passed explicitly
   */
  engine: FutureEngine;
  logger: Logger;
}

const defaults: Settings = { engine: nativeEngine, logger: console };

let current: Settings = { ...defaults };

/**
 * Merges the given overrides into the package settings. Missing or nil overrides keep the current value
 * @param overrides
 */
export function configure(overrides: Partial<Settings>): Readonly<Settings> {
  current = {
    engine: overrides.engine ?? current.engine,
    logger: overrides.logger ?? current.logger,
  };
  return current;
}

export function getSettings(): Readonly<Settings> {
  return current;
}

/**
 * Restores the default engine and logger
 */
export function resetSettings() {
  current = { ...defaults };
}

/**
 * Console logger with a `[quantgeo]` prefix. Debug output is only written
 * when the `debug` config flag is on.
 */

import { config } from "./config.js";

const PREFIX = "[quantgeo]";

function debug(message: string): void {
  if (!config.get("debug")) return;
  console.log(`${PREFIX} ${message}`);
}

function warn(message: string): void {
  console.warn(`${PREFIX} ${message}`);
}

export const logger = {
  debug,
  warn,
} as const;

import type { LogLevelString } from "bunyan";
import { DEFAULT_CONFIG } from "./engine/types";

const LOG_LEVELS: LogLevelString[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function parseLogLevel(value: string | undefined): LogLevelString {
  const level = LOG_LEVELS.find((l) => l === value);
  return level ?? "info";
}

export default {
  get logLevel(): LogLevelString {
    return parseLogLevel(process.env.LOG_LEVEL);
  },
  get maxComponentSize(): number {
    const parsed = parseInt(process.env.CSP_MAX_COMPONENT_SIZE || "", 10);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_CONFIG.maxComponentSize;
  },
};

import pino from "pino";
import type { Logger } from "pino";

export function createLogger(name?: string, level?: string): Logger {
  return pino({ name: name ?? "ratewarden", level: level ?? "info" });
}

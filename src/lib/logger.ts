import pino from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

export function createLogger(opts: { level?: string } = {}): Logger {
  return pino({
    level: opts.level ?? process.env.LOG_LEVEL ?? "info",
    base: { service: "grounded-review" },
    // JSON to stdout, no transports
  });
}

export function createChildLogger(
  logger: Logger,
  context: { reviewId?: string; prNumber?: number; [key: string]: unknown },
): Logger {
  return logger.child(context);
}

import winston from "winston";

const isProduction = process.env.NODE_ENV === "production";

// Run ids are uuids; the first block is enough to tell runs apart on a console.
export function runTag(runId: unknown): string {
  return typeof runId === "string" && runId !== "" ? ` run ${runId.slice(0, 8)}` : "";
}

export const logger = winston.createLogger({
  level: process.env.SYNC_LOG_LEVEL || "info",
  silent: process.env.NODE_ENV === "test",
  format: isProduction
    ? winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      )
    : winston.format.combine(
        winston.format.timestamp({ format: "HH:mm:ss" }),
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, context, runId, ...rest }) => {
          const ctx = context ? `[${context}${runTag(runId)}]` : "";
          const extra = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : "";
          return `${timestamp} ${level} ${ctx} ${message}${extra}`;
        })
      ),
  transports: [new winston.transports.Console()],
});

export function createChildLogger(context: string) {
  return logger.child({ context });
}

/** Raise or lower verbosity after env has been validated (CLI startup). */
export function setLogLevel(level: string): void {
  logger.level = level;
}

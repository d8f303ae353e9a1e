import winston from "winston";

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
  winston.format.errors({ stack: true }),
  winston.format.printf((info) => {
    const { timestamp, level, message, stack, component, ...meta } = info;
    const scope = typeof component === "string" ? ` [${component}]` : "";
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : "";
    const stackStr = typeof stack === "string" ? `\n${stack}` : "";
    return `${String(timestamp)} | ${level.toUpperCase()}${scope} | ${String(
      message
    )}${metaStr}${stackStr}`;
  })
);

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  // Vitest sets NODE_ENV=test; keep test output clean
  silent: process.env.NODE_ENV === "test",
  format: consoleFormat,
  transports: [new winston.transports.Console()],
  exitOnError: false,
});

export const getLogger = (component: string): winston.Logger =>
  logger.child({ component });

/** Log metadata for a caught value; Error objects do not survive JSON. */
export const describeError = (error: unknown): string =>
  error instanceof Error ? error.stack ?? error.message : String(error);

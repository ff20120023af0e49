import winston from "winston";

const { combine, colorize, json, printf, timestamp } = winston.format;

const devFormat = printf(({ level, message, timestamp: ts, ...meta }) => {
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(ts)} ${level}: ${String(message)}${rest}`;
});

/**
 * Process-wide logger. Everything goes to stderr so command output on stdout
 * (a rendered Dockerfile, a substituted .env) stays pipeable.
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format:
    process.env.NODE_ENV === "production"
      ? combine(timestamp(), json())
      : combine(colorize(), timestamp({ format: "HH:mm:ss" }), devFormat),
  transports: [
    new winston.transports.Console({
      stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
    }),
  ],
});

/** Apply the level from parsed configuration (LOG_LEVEL may arrive via --env-file). */
export function setLogLevel(level: string): void {
  logger.level = level;
}

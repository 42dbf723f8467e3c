import winston from "winston";

// stdout carries the MCP stdio transport, so every level goes to stderr.
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(
      ({ timestamp, level, message }) =>
        `${String(timestamp)} [${level}] ${String(message)}`,
    ),
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: ["error", "warn", "info", "debug"],
    }),
  ],
});

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatParts(parts: unknown[]): string {
  return parts
    .map((part) => {
      if (typeof part === "string") return part;
      if (part instanceof Error) return part.message;
      return JSON.stringify(part);
    })
    .join(" ");
}

export function logDebug(...parts: unknown[]): void {
  logger.debug(formatParts(parts));
}

export function logInfo(...parts: unknown[]): void {
  logger.info(formatParts(parts));
}

export function logWarn(...parts: unknown[]): void {
  logger.warn(formatParts(parts));
}

export function logError(...parts: unknown[]): void {
  logger.error(formatParts(parts));
}

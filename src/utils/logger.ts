/**
 * Session logging.
 *
 * One winston logger for the process; each module takes a child tagged with
 * its component ("supervisor", "reconciler", "book", "ibkr", ...). Gateway
 * rows and order ids go into the message text so a single grep follows an
 * order or an instrument through a reconnect.
 */

import winston from "winston";

const { combine, timestamp, printf, colorize, errors } = winston.format;

const logFormat = printf(({ level, message, timestamp, component, ...meta }) => {
  const componentTag = component ? `[${String(component)}]` : "[session]";
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(timestamp)} ${level} ${componentTag} ${String(message)}${metaStr}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: combine(
    errors({ stack: true }),
    timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), logFormat),
    }),
  ],
});

/** Create a child logger tagged with a component name */
export function componentLogger(component: string): winston.Logger {
  return logger.child({ component });
}

/** Render an unknown thrown value for log metadata */
export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}

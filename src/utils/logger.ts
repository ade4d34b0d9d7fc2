import type { IncomingMessage } from "http";
import pino from "pino";

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === "production" ? "info" : "debug");

export const logger = pino({
  level,
  redact: {
    paths: ["req.headers.authorization", "req.headers.cookie", "req.headers[\"x-caller-id\"]", "req.headers[\"x-role\"]"],
    remove: true
  }
});

export type Logger = typeof logger;

const headerValue = (req: IncomingMessage, name: string): string | undefined => {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
};

/** Caller identity as top-level request log fields; the raw headers are redacted. */
export const requestLogProps = (req: IncomingMessage): { callerId?: string; role?: string } => ({
  callerId: headerValue(req, "x-caller-id"),
  role: headerValue(req, "x-role")?.toLowerCase()
});

import pino, { type Logger } from "pino";

// stdout carries the command's result, so log lines go to stderr.
const root = pino(
  { level: process.env.LOG_LEVEL || "info" },
  pino.destination(2)
);

export function createLogger(name: string, level?: string): Logger {
  return level ? root.child({ name }, { level }) : root.child({ name });
}

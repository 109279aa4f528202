import "dotenv/config";
import pino, { type Logger } from "pino";

export type { Logger };

const defaultLevel = process.env.NODE_ENV === "production" ? "info" : "debug";

export const logger: Logger = pino({
  name: "finadvisor",
  level: process.env.LOG_LEVEL ?? defaultLevel,
});

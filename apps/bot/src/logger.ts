import pino from "pino";

export const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  base: { service: "replyledger-bot" }
});

export type Logger = typeof logger;

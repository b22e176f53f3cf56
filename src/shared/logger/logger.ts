import pino from "pino";

export const logger = pino({
  name: "signal-insight-pipeline",
  level:
    process.env.LOG_LEVEL ??
    (process.env.NODE_ENV === "production"
      ? "info"
      : process.env.NODE_ENV === "test"
        ? "silent"
        : "debug"),
});

export type Logger = typeof logger;

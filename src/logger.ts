import pino from "pino";
import { config } from "./config";

export const logger = pino({
  level: config.logLevel || (config.nodeEnv === "production" ? "info" : "debug"),
  enabled: config.nodeEnv !== "test",
  transport:
    config.nodeEnv === "production" || config.nodeEnv === "test"
      ? undefined
      : { target: "pino-pretty" },
  base: { service: "request-trace" },
});

import dotenv from "dotenv";
import { z } from "zod";
dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().nonnegative().default(4000),
  LOG_LEVEL: z.string().optional(),
  TRACE_FORMAT: z.enum(["plain", "kvp"]).default("plain"),
  TRACE_LOGGING: z
    .enum(["true", "false"])
    .default("true")
    .transform((v) => v === "true"),
});

const env = envSchema.parse(process.env);

/** Centralized configuration loader with sane defaults. */
export const config = {
  nodeEnv: env.NODE_ENV,
  port: env.PORT,
  logLevel: env.LOG_LEVEL,

  // Token shape: plain hex digest or request_id=<digest>
  traceFormat: env.TRACE_FORMAT,
  // "new request" / "done" lines
  traceLogging: env.TRACE_LOGGING,
};

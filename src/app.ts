import express from "express";
import { traceMiddleware } from "./middlewares/trace";
import { errorHandler, notFound } from "./middlewares/errorHandler";
import { demoRoutes } from "./routes/demo";
import { traceLog as defaultTraceLog, TraceLog } from "./services/traceLog";
import { TokenFormat } from "./utils/token";
import { config } from "./config";

export type AppOptions = {
  traceLog?: TraceLog;
  format?: TokenFormat;
  logging?: boolean;
};

export function createApp(options: AppOptions = {}) {
  const {
    traceLog = defaultTraceLog,
    format = config.traceFormat,
    logging = config.traceLogging,
  } = options;

  const app = express();

  /* -----------------------------
     Request tracing
  ----------------------------- */
  app.use(traceMiddleware({ traceLog, format, logging }));

  /* -----------------------------
     Health check
  ----------------------------- */
  app.get("/healthz", (_req, res) => {
    res.json({ ok: true });
  });

  /* -----------------------------
     Demo routes
  ----------------------------- */
  app.use("/", demoRoutes(traceLog));

  /* -----------------------------
     Error handling
  ----------------------------- */
  app.use(notFound);
  app.use(errorHandler(traceLog));

  return app;
}

export default createApp;

// src/index.ts
import { createApp } from "./app";
import { config } from "./config";
import { logger } from "./logger";

export * from "./errors";
export * from "./utils/token";
export * from "./utils/duration";
export * from "./services/scopeStore";
export * from "./services/statusRecorder";
export * from "./services/traceLog";
export * from "./middlewares/trace";
export { errorHandler, notFound } from "./middlewares/errorHandler";
export { createApp } from "./app";

if (require.main === module) {
  const app = createApp();
  app.listen(config.port, () => {
    logger.info({ port: config.port, format: config.traceFormat }, `request-trace demo on http://localhost:${config.port}`);
  });
}

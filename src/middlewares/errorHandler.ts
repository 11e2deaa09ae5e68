import { Request, Response, NextFunction } from "express";
import { TraceLog } from "../services/traceLog";

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null && "statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return 500;
}

/** Standardized error handler; answers with the request's trace token. */
export function errorHandler(traceLog: TraceLog) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId = traceLog.token(req);
    const status = statusOf(err);
    const message = err instanceof Error && err.message ? err.message : "Internal Server Error";
    traceLog.error(req, "unhandled error:", err);
    res.status(status).json({ error: message, requestId });
  };
}

/** 404 handler */
export function notFound(_req: Request, res: Response) {
  res.status(404).json({ error: "Not Found" });
}

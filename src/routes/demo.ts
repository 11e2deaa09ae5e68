// src/routes/demo.ts
import express from "express";
import { TraceLog } from "../services/traceLog";

/** Routes that show the tracing facade from inside a handler. */
export function demoRoutes(traceLog: TraceLog) {
  const router = express.Router();

  // Echo the bound token (label included in kvp mode)
  router.get("/token", (req, res) => {
    traceLog.logln(req, "echoing token");
    res.type("text/plain").send(traceLog.token(req));
  });

  // Echo the token without its request_id= label; 500 on a plain token
  router.get("/token/plain", (req, res) => {
    res.type("text/plain").send(traceLog.tokenPlain(req));
  });

  router.get("/fail", (req, res) => {
    traceLog.logf(req, "failing on purpose for %s", req.originalUrl);
    res.status(500).send("failed");
  });

  router.get("/boom", () => {
    throw new Error("boom");
  });

  return router;
}

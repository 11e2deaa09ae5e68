// src/middlewares/trace.ts
import { Request, RequestHandler } from "express";
import { traceLog as defaultTraceLog, TraceLog, STATUS_KEY } from "../services/traceLog";
import { StatusRecorder } from "../services/statusRecorder";
import { generateToken, wallClock, TokenFormat } from "../utils/token";
import { formatDuration } from "../utils/duration";

export type TraceOptions = {
  traceLog?: TraceLog;
  /** Log "new request" and "done" lines (default true). */
  logging?: boolean;
  /** Release the scope entry once the response is done (default true). */
  clear?: boolean;
  format?: TokenFormat;
  /** Wall clock fed into the token, epoch ms. */
  clock?: () => number;
  /** Monotonic clock for the elapsed time, in ns. */
  timer?: () => bigint;
};

function remoteAddressOf(req: Request): string {
  return `${req.socket.remoteAddress ?? ""}:${req.socket.remotePort ?? ""}`;
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";
}

/**
 * Wrap `handler`: bind a fresh token to the request, then run the handler once.
 *
 * The token is bound before the handler runs. With logging on, the response is
 * intercepted to record its status and a completion line is written when it
 * finishes, closes, or its hijacked socket closes. With clear on, the scope
 * entry is released once the response is done and the handler has settled, so
 * work an async handler does after answering still logs with its token.
 *
 * A handler that throws or rejects is logged at error level and passed to
 * `next(err)`; completion and release then follow the error response.
 */
export function traceHandler(handler: RequestHandler, options: TraceOptions = {}): RequestHandler {
  const {
    traceLog = defaultTraceLog,
    logging = true,
    clear = true,
    format = "plain",
    clock = wallClock,
    timer = () => process.hrtime.bigint(),
  } = options;

  return (req, res, next) => {
    const token = generateToken(
      { url: req.originalUrl, remoteAddress: remoteAddressOf(req), instant: clock() },
      format
    );
    traceLog.bind(req, token);

    const start = timer();
    let recorder: StatusRecorder | undefined;
    let responded = false;
    let settled = false;
    const releaseWhenIdle = () => {
      if (clear && responded && settled) traceLog.release(req);
    };
    const finish = () => {
      if (responded) return;
      responded = true;
      if (recorder) {
        traceLog.logln(req, "done, status:", recorder.getStatus(), "time:", formatDuration(timer() - start));
      }
      releaseWhenIdle();
    };
    const settle = () => {
      settled = true;
      releaseWhenIdle();
    };

    if (logging) {
      traceLog.logln(req, "new request", req.method, req.originalUrl);
      recorder = StatusRecorder.intercept(res, {
        onHijack: (socket) => socket.once("close", finish),
      });
      traceLog.store.bind(req, STATUS_KEY, recorder);
    }
    if (logging || clear) {
      res.once("finish", finish);
      res.once("close", finish);
    }

    const fail = (err: unknown) => {
      traceLog.error(req, "handler failed:", err);
      next(err);
    };
    let result: unknown;
    try {
      result = handler(req, res, next);
    } catch (err) {
      settle();
      fail(err);
      return;
    }
    if (!isThenable(result)) {
      settle();
      return;
    }
    Promise.resolve(result).then(settle, (err: unknown) => {
      settle();
      fail(err);
    });
  };
}

/** Like traceHandler but without the "new request" / "done" lines. */
export function noLogHandler(handler: RequestHandler, options: TraceOptions = {}): RequestHandler {
  return traceHandler(handler, { ...options, logging: false });
}

/**
 * Like traceHandler but never releases the scope entry.
 * For long-lived connections where the wrapper cannot tell when handling ends;
 * every request leaves one entry behind in the store.
 */
export function noClearHandler(handler: RequestHandler, options: TraceOptions = {}): RequestHandler {
  return traceHandler(handler, { ...options, clear: false });
}

/** No logging and no release; see noClearHandler for the leak this accepts. */
export function noLogClearHandler(handler: RequestHandler, options: TraceOptions = {}): RequestHandler {
  return traceHandler(handler, { ...options, logging: false, clear: false });
}

/**
 * Like traceHandler but the token is bound as `request_id=<digest>`, so lines read
 *   <timestamp> request_id=<digest> <message>
 * which log parsers pick up as a key-value pair.
 */
export function kvpHandler(handler: RequestHandler, options: TraceOptions = {}): RequestHandler {
  return traceHandler(handler, { ...options, format: "kvp" });
}

/** traceHandler around the rest of the stack, for `app.use()`. */
export function traceMiddleware(options: TraceOptions = {}): RequestHandler {
  return traceHandler((_req, _res, next) => next(), options);
}

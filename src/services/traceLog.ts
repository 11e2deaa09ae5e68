// src/services/traceLog.ts
import { inspect } from "util";
import { ScopeStore } from "./scopeStore";
import { StatusRecorder } from "./statusRecorder";
import { MalformedTokenError } from "../errors";
import { logger } from "../logger";

export const TOKEN_KEY = "_token";
export const STATUS_KEY = "_status";

/** Where trace lines go. A pino logger satisfies it. */
export interface LogSink {
  info(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

function formatValue(value: unknown): string {
  return typeof value === "string" ? value : inspect(value, { breakLength: Infinity });
}

/** Concatenate, spacing only between two adjacent non-string operands. */
function joinOperands(values: unknown[]): string {
  return values
    .map((value, i) => {
      const spaced = i > 0 && typeof value !== "string" && typeof values[i - 1] !== "string";
      return (spaced ? " " : "") + formatValue(value);
    })
    .join("");
}

function joinSpaced(values: unknown[]): string {
  return values.map(formatValue).join(" ");
}

/**
 * Logging facade over a scope store.
 *
 * Public API:
 *   - token(req) / tokenPlain(req)
 *   - log(req, ...values)        operands concatenated
 *   - logln(req, ...values)      operands space-separated
 *   - logf(req, format, ...args) printf-style, formatted by the sink
 *   - error(req, ...values)      like logln, at error level
 *
 * Every line starts with the request's token; a request without one logs the
 * bare message.
 */
export class TraceLog {
  constructor(
    private readonly sink: LogSink,
    readonly store: ScopeStore = new ScopeStore()
  ) {}

  bind(req: object, token: string): void {
    this.store.bind(req, TOKEN_KEY, token);
  }

  release(req: object): void {
    this.store.release(req);
  }

  /** Bound token (key-value label included), "" if none. */
  token(req: object): string {
    const token = this.store.get(req, TOKEN_KEY);
    return typeof token === "string" ? token : "";
  }

  /** Token without its `request_id=` label; "" if none. Throws on any other shape. */
  tokenPlain(req: object): string {
    const token = this.token(req);
    if (!token) return "";
    const parts = token.split("=");
    if (parts.length !== 2) throw new MalformedTokenError(token);
    return parts[1];
  }

  /** Status recorder the wrapper attached to this request, if any. */
  statusRecorder(req: object): StatusRecorder | undefined {
    const recorder = this.store.get(req, STATUS_KEY);
    return recorder instanceof StatusRecorder ? recorder : undefined;
  }

  log(req: object, ...values: unknown[]): void {
    this.sink.info(this.line(req, joinOperands(values)));
  }

  logln(req: object, ...values: unknown[]): void {
    this.sink.info(this.line(req, joinSpaced(values)));
  }

  logf(req: object, format: string, ...values: unknown[]): void {
    const token = this.token(req);
    if (token) this.sink.info(`%s ${format}`, token, ...values);
    else this.sink.info(format, ...values);
  }

  error(req: object, ...values: unknown[]): void {
    this.sink.error(this.line(req, joinSpaced(values)));
  }

  private line(req: object, message: string): string {
    const token = this.token(req);
    return token ? `${token} ${message}` : message;
  }
}

/** Process-wide facade writing to the pino logger. */
export const traceLog = new TraceLog(logger);

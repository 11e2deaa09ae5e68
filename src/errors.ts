// src/errors.ts

/** Base class for tracing errors; `statusCode` is what the error handler answers with. */
export class TraceError extends Error {
  constructor(message: string, readonly statusCode = 500) {
    super(message);
    this.name = new.target.name;
  }
}

/** The wrapped response cannot provide the requested capability (e.g. connection takeover). */
export class CapabilityNotSupportedError extends TraceError {
  constructor(readonly capability: string) {
    super(`${capability} not supported`);
  }
}

/** A bound token does not split into exactly one `key=value` pair. */
export class MalformedTokenError extends TraceError {
  constructor(readonly token: string) {
    super(`malformed request token: ${token}`);
  }
}

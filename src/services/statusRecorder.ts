// src/services/statusRecorder.ts
import { STATUS_CODES } from "http";
import type { Socket } from "net";
import { CapabilityNotSupportedError } from "../errors";

/** The part of a Node `ServerResponse` the recorder forwards to. */
export interface ResponseSink {
  setHeader(name: string, value: number | string | readonly string[]): unknown;
  writeHead(statusCode: number, ...rest: unknown[]): unknown;
  write(chunk: string | Uint8Array): boolean;
  end(chunk?: string | Uint8Array): unknown;
  readonly socket?: Socket | null;
  detachSocket?(socket: Socket): void;
}

/** Connection takeover: the caller owns the raw socket from then on. */
export interface Hijacker {
  hijack(): Socket;
}

export type StatusRecorderOptions = {
  /** Called with the socket once the connection has been taken over. */
  onHijack?: (socket: Socket) => void;
};

/**
 * Wraps a response sink and remembers the status code it is sent.
 *
 * Every call is forwarded unchanged. A body written before any explicit status
 * is recorded as 200, which is what Node sends implicitly.
 */
export class StatusRecorder {
  private status = 0;
  private readonly forwardWriteHead: (statusCode: number, ...rest: unknown[]) => unknown;

  constructor(
    private readonly sink: ResponseSink,
    private readonly options: StatusRecorderOptions = {}
  ) {
    this.forwardWriteHead = sink.writeHead.bind(sink);
  }

  /**
   * Route `res.writeHead` through a new recorder.
   * Node commits every status (explicit or implicit) through `writeHead`, so
   * handlers can keep writing to `res` directly.
   */
  static intercept(res: ResponseSink, options: StatusRecorderOptions = {}): StatusRecorder {
    const recorder = new StatusRecorder(res, options);
    res.writeHead = (statusCode: number, ...rest: unknown[]) => recorder.writeHead(statusCode, ...rest);
    return recorder;
  }

  setHeader(name: string, value: number | string | readonly string[]): this {
    this.sink.setHeader(name, value);
    return this;
  }

  writeHead(statusCode: number, ...rest: unknown[]): unknown {
    this.status = statusCode;
    return this.forwardWriteHead(statusCode, ...rest);
  }

  write(chunk: string | Uint8Array): boolean {
    if (this.status === 0) this.status = 200;
    return this.sink.write(chunk);
  }

  end(chunk?: string | Uint8Array): this {
    if (this.status === 0) this.status = 200;
    this.sink.end(chunk);
    return this;
  }

  /** Last recorded status, 0 if none yet. */
  get statusCode(): number {
    return this.status;
  }

  /** e.g. "404 Not Found"; "200 OK" when nothing was recorded. */
  getStatus(): string {
    const code = this.status === 0 ? 200 : this.status;
    const reason = STATUS_CODES[code];
    return reason ? `${code} ${reason}` : String(code);
  }

  /** Takeover capability of the underlying sink, if it has one. */
  hijacker(): Hijacker | undefined {
    const { sink } = this;
    const socket = sink.socket;
    if (!socket || !sink.detachSocket) return undefined;
    return {
      hijack: () => {
        sink.detachSocket?.(socket);
        this.options.onHijack?.(socket);
        return socket;
      },
    };
  }

  hijack(): Socket {
    const hijacker = this.hijacker();
    if (!hijacker) throw new CapabilityNotSupportedError("hijack");
    return hijacker.hijack();
  }
}

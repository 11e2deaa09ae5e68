import http from "node:http";
import net from "node:net";
import { format } from "node:util";
import type { LogSink } from "../src/services/traceLog";

export type CapturedLine = {
  level: "info" | "error";
  msg: string;
  args: unknown[];
  text: string;
};

/** LogSink that keeps every line in memory, rendered the way pino would. */
export function captureSink(): { sink: LogSink; lines: CapturedLine[]; texts: () => string[] } {
  const lines: CapturedLine[] = [];
  const record = (level: CapturedLine["level"]) => (msg: string, ...args: unknown[]) => {
    lines.push({ level, msg, args, text: args.length ? format(msg, ...args) : msg });
  };
  return {
    sink: { info: record("info"), error: record("error") },
    lines,
    texts: () => lines.map((l) => l.text),
  };
}

export type Served = {
  port: number;
  close: () => Promise<void>;
};

/** Start `listener` on an ephemeral loopback port. */
export async function serve(listener: http.RequestListener): Promise<Served> {
  const server = http.createServer(listener);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server has no port");
  return {
    port: address.port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

export function get(
  port: number,
  path: string
): Promise<{ status: number; headers: http.IncomingHttpHeaders; body: string }> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      { hostname: "127.0.0.1", port, path, method: "GET", agent: false },
      (res) => {
        let data = "";
        res.on("data", (chunk) => {
          data += chunk;
        });
        res.on("end", () => resolve({ status: res.statusCode ?? 0, headers: res.headers, body: data }));
      }
    );
    req.on("error", reject);
    req.end();
  });
}

/** Send `payload` over a bare TCP connection and collect everything until the server ends it. */
export function rawRequest(port: number, payload: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = net.connect(port, "127.0.0.1", () => {
      socket.write(payload);
    });
    let data = "";
    socket.setEncoding("utf8");
    socket.on("data", (chunk: string) => {
      data += chunk;
    });
    socket.on("end", () => resolve(data));
    socket.on("error", reject);
  });
}

// Server-sent events over a plain HTTP response.

/** The slice of an Express/Node response an event stream writes to. */
export interface EventStreamResponse {
  status(code: number): unknown;
  setHeader(name: string, value: string): unknown;
  flushHeaders(): void;
  write(chunk: string): boolean;
  on(event: "close", listener: () => void): unknown;
  end(): unknown;
}

export interface EventStream {
  send(event: string, data: unknown): void;
  /** Comment frame; proxies drop idle connections without one. */
  ping(): void;
  isClosed(): boolean;
  close(): void;
}

export function openEventStream(res: EventStreamResponse): EventStream {
  let closed = false;
  res.on("close", () => {
    closed = true;
  });

  res.status(200);
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache, no-transform");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no");
  res.flushHeaders();

  const ping = () => {
    if (!closed) res.write(":\n\n");
  };
  ping();

  return {
    send(event, data) {
      if (closed) return;
      res.write(`event: ${event}\n`);
      res.write(`data: ${JSON.stringify(data)}\n\n`);
    },
    ping,
    isClosed: () => closed,
    close() {
      if (closed) return;
      closed = true;
      res.end();
    },
  };
}

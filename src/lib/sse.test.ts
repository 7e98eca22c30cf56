import { openEventStream, type EventStreamResponse } from "./sse";

class FakeResponse implements EventStreamResponse {
  statusCode = 0;
  headers: Record<string, string> = {};
  frames: string[] = [];
  flushed = false;
  endCalls = 0;
  private closeListener: (() => void) | undefined;

  status(code: number) {
    this.statusCode = code;
    return this;
  }

  setHeader(name: string, value: string) {
    this.headers[name] = value;
    return this;
  }

  flushHeaders() {
    this.flushed = true;
  }

  write(chunk: string) {
    this.frames.push(chunk);
    return true;
  }

  on(_event: "close", listener: () => void) {
    this.closeListener = listener;
    return this;
  }

  end() {
    this.endCalls++;
    return this;
  }

  disconnect() {
    this.closeListener?.();
  }
}

describe("openEventStream", () => {
  it("sends the stream headers and an opening comment", () => {
    const res = new FakeResponse();

    openEventStream(res);

    expect(res.statusCode).toBe(200);
    expect(res.headers).toEqual({
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache, no-transform",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
    });
    expect(res.flushed).toBe(true);
    expect(res.frames).toEqual([":\n\n"]);
  });

  it("frames events as event and data lines", () => {
    const res = new FakeResponse();
    const stream = openEventStream(res);

    stream.send("progress", { state: "Matched", progress: 50 });
    stream.ping();

    expect(res.frames.slice(1)).toEqual([
      "event: progress\n",
      'data: {"state":"Matched","progress":50}\n\n',
      ":\n\n",
    ]);
  });

  it("stops writing once the client disconnects", () => {
    const res = new FakeResponse();
    const stream = openEventStream(res);

    res.disconnect();
    stream.send("progress", { state: "Priced" });
    stream.ping();

    expect(stream.isClosed()).toBe(true);
    expect(res.frames).toEqual([":\n\n"]);
  });

  it("ends the response only once", () => {
    const res = new FakeResponse();
    const stream = openEventStream(res);

    stream.close();
    stream.close();

    expect(res.endCalls).toBe(1);
    expect(stream.isClosed()).toBe(true);
  });
});

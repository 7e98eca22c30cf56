import {
  RunCancelledError,
  UpstreamError,
  ValidationError,
  isRetryableError,
} from "./errors";
import {
  DEFAULT_RETRY_POLICY,
  backoffDelay,
  sleep,
  withRetry,
  withTimeout,
} from "./retry";

const call = { service: "llm" as const, label: "test call" };

beforeEach(() => {
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("withRetry", () => {
  it("retries transient failures with exponential backoff", async () => {
    const fn = jest
      .fn<Promise<string>, [AbortSignal]>()
      .mockRejectedValueOnce(new UpstreamError("llm", "busy", { status: 503 }))
      .mockRejectedValueOnce(new UpstreamError("llm", "busy", { status: 429 }))
      .mockResolvedValue("ok");
    const wait = jest.fn(async () => undefined);

    await expect(withRetry(call, fn, DEFAULT_RETRY_POLICY, undefined, wait)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(wait.mock.calls).toEqual([
      [250, undefined],
      [500, undefined],
    ]);
  });

  it("gives up after the last attempt with the last error", async () => {
    const last = new UpstreamError("llm", "still down", { status: 502 });
    const fn = jest
      .fn<Promise<string>, [AbortSignal]>()
      .mockRejectedValueOnce(new UpstreamError("llm", "down", { status: 502 }))
      .mockRejectedValueOnce(new UpstreamError("llm", "down", { status: 502 }))
      .mockRejectedValueOnce(last);
    const wait = jest.fn(async () => undefined);

    await expect(withRetry(call, fn, DEFAULT_RETRY_POLICY, undefined, wait)).rejects.toBe(last);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(wait).toHaveBeenCalledTimes(2);
  });

  it("does not retry validation errors", async () => {
    const err = new ValidationError("bad record");
    const fn = jest.fn<Promise<string>, [AbortSignal]>().mockRejectedValue(err);
    const wait = jest.fn(async () => undefined);

    await expect(withRetry(call, fn, DEFAULT_RETRY_POLICY, undefined, wait)).rejects.toBe(err);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
  });

  it("does not start once the run is cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = jest.fn<Promise<string>, [AbortSignal]>().mockResolvedValue("ok");

    await expect(
      withRetry(call, fn, DEFAULT_RETRY_POLICY, controller.signal)
    ).rejects.toBeInstanceOf(RunCancelledError);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe("backoffDelay", () => {
  it("doubles up to the cap", () => {
    const policy = { ...DEFAULT_RETRY_POLICY, baseDelayMs: 250, maxDelayMs: 1000 };
    expect([1, 2, 3, 4].map((n) => backoffDelay(policy, n))).toEqual([250, 500, 1000, 1000]);
  });
});

describe("withTimeout", () => {
  it("times out a hanging call and aborts its signal", async () => {
    let seen: AbortSignal | undefined;
    const hanging = (signal: AbortSignal) => {
      seen = signal;
      return new Promise<string>(() => undefined);
    };

    await expect(withTimeout(call, hanging, 20)).rejects.toMatchObject({
      code: "UPSTREAM_UNAVAILABLE",
      service: "llm",
      timedOut: true,
    });
    expect(seen?.aborted).toBe(true);
  });

  it("rejects as cancelled when the parent aborts", async () => {
    const controller = new AbortController();
    const pending = withTimeout(call, () => new Promise<string>(() => undefined), 1000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RunCancelledError);
  });
});

describe("sleep", () => {
  it("rejects when aborted mid-wait", async () => {
    const controller = new AbortController();
    const pending = sleep(1000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RunCancelledError);
  });
});

describe("isRetryableError", () => {
  it.each([
    [new UpstreamError("llm", "timeout", { timedOut: true }), true],
    [new UpstreamError("embedding", "socket hang up"), true],
    [new UpstreamError("llm", "rate limited", { status: 429 }), true],
    [new UpstreamError("vector-search", "unavailable", { status: 503 }), true],
    [new UpstreamError("llm", "bad request", { status: 400 }), false],
    [new ValidationError("bad"), false],
    [new Error("boom"), false],
  ])("classifies %s", (err, expected) => {
    expect(isRetryableError(err)).toBe(expected);
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  DocumentUnreadableError,
  EmbeddingServiceError,
  IndexNotReadyError,
  InvalidConfigurationError,
  InvalidMethodError,
  errorMessage,
  isRetrievalError,
} from "../../src/errors";
import { createLogger, getLogLevel, setLogLevel } from "../../src/utils/logger";
import { backoffDelay, withRetry } from "../../src/utils/retry";
import { truncate } from "../../src/utils/text";

describe("truncate", () => {
  it("should leave short text alone", () => {
    expect(truncate("short", 10)).toBe("short");
  });

  it("should cut long text and mark it", () => {
    expect(truncate("abcdefghij", 4)).toBe("abcd...");
  });
});

describe("backoffDelay", () => {
  it("should grow exponentially up to the cap", () => {
    expect(backoffDelay(1, 100)).toBe(100);
    expect(backoffDelay(2, 100)).toBe(200);
    expect(backoffDelay(4, 100)).toBe(800);
    expect(backoffDelay(4, 100, 2, 500)).toBe(500);
  });
});

describe("withRetry", () => {
  it("should return the first successful result", async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 2) throw new Error(`fail ${attempt}`);
      return "done";
    });
    const onRetry = vi.fn();

    await expect(withRetry(fn, { retries: 3, baseDelayMs: 0, onRetry })).resolves.toBe("done");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map((call) => call[1])).toEqual([1, 2]);
  });

  it("should give up after the retry budget", async () => {
    const fn = vi.fn(async () => {
      throw new Error("still failing");
    });
    await expect(withRetry(fn, { retries: 2, baseDelayMs: 0 })).rejects.toThrow("still failing");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("should stop when shouldRetry declines", async () => {
    const fn = vi.fn(async () => {
      throw new InvalidConfigurationError("bad");
    });
    await expect(
      withRetry(fn, {
        retries: 5,
        baseDelayMs: 0,
        shouldRetry: (error) => isRetrievalError(error) && error.retryable,
      }),
    ).rejects.toBeInstanceOf(InvalidConfigurationError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should wait the backoff delay between attempts", async () => {
    vi.useFakeTimers();
    try {
      let calls = 0;
      const promise = withRetry(
        async () => {
          calls++;
          if (calls === 1) throw new Error("once");
          return calls;
        },
        { retries: 1, baseDelayMs: 1000 },
      );

      await vi.advanceTimersByTimeAsync(999);
      expect(calls).toBe(1);
      await vi.advanceTimersByTimeAsync(1);
      await expect(promise).resolves.toBe(2);
    } finally {
      vi.useRealTimers();
    }
  });
});

describe("errors", () => {
  it("should carry a code and retryable flag", () => {
    expect(new InvalidConfigurationError("x").code).toBe("INVALID_CONFIGURATION");
    expect(new EmbeddingServiceError("x").retryable).toBe(true);
    expect(new IndexNotReadyError("x").retryable).toBe(false);
    expect(new InvalidMethodError("bm25").message).toBe(
      'Unknown retrieval method "bm25". Expected one of: dense, sparse, hybrid',
    );
    expect(new DocumentUnreadableError("a.pdf", "bad xref").message).toBe(
      'Document "a.pdf" is unreadable: bad xref',
    );
  });

  it("should name errors after their class", () => {
    expect(new IndexNotReadyError("x").name).toBe("IndexNotReadyError");
    expect(isRetrievalError(new IndexNotReadyError("x"))).toBe(true);
    expect(isRetrievalError(new Error("x"))).toBe(false);
  });

  it("should describe unknown thrown values", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});

describe("createLogger", () => {
  beforeEach(() => {
    setLogLevel("info");
  });

  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("should prefix lines with level and scope", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
    createLogger("store").warn("disk almost full");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ WARN \[store\] disk almost full$/);
  });

  it("should drop messages below the threshold", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    setLogLevel("warn");
    createLogger("store").info("hidden");

    expect(getLogLevel()).toBe("warn");
    expect(spy).not.toHaveBeenCalled();
  });

  it("should pass extra data through", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const cause = new Error("cause");
    createLogger("api").error("failed", cause);

    expect(spy.mock.calls[0][1]).toBe(cause);
  });
});

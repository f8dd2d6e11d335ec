import { describe, it, expect, vi } from "vitest";
import { ExternalServiceError, RateLimitedError } from "@ragweave/errors";
import { createSilentLogger } from "@ragweave/logger";
import { batchInvokeWithRetry, batchSizeFor } from "./batch-invoker.js";
import { Pipeline } from "./pipeline.js";

const range = (from: number, to: number): number[] =>
  Array.from({ length: to - from + 1 }, (_, i) => from + i);

function noSleep() {
  return vi.fn(async (_ms: number) => {});
}

describe("batchSizeFor", () => {
  it("uses 30 below tier 4 and 80 from tier 4", () => {
    expect(batchSizeFor(1, 100)).toBe(30);
    expect(batchSizeFor(3, 100)).toBe(30);
    expect(batchSizeFor(4, 100)).toBe(80);
    expect(batchSizeFor(5, 12)).toBe(12);
  });
});

describe("batchInvokeWithRetry", () => {
  const identity = Pipeline.from("identity", (n: number) => n);

  it("splits 100 inputs into [30, 30, 30, 10] for tier 1", async () => {
    const sleep = noSleep();

    const results = await batchInvokeWithRetry(identity, range(1, 100), { sleep });

    expect(results.map((batch) => batch.length)).toEqual([30, 30, 30, 10]);
    expect(results.flat()).toEqual(range(1, 100));
  });

  it("splits 100 inputs into [80, 20] for tier 4", async () => {
    const results = await batchInvokeWithRetry(identity, range(1, 100), {
      userTier: 4,
      sleep: noSleep(),
    });

    expect(results.map((batch) => batch.length)).toEqual([80, 20]);
  });

  it("paces between successful batches only", async () => {
    const sleep = noSleep();

    await batchInvokeWithRetry(identity, range(1, 100), { sleep, pacingMs: 2_000 });

    expect(sleep.mock.calls).toEqual([[2_000], [2_000], [2_000]]);
  });

  it("returns [] for no inputs", async () => {
    await expect(batchInvokeWithRetry(identity, [], { sleep: noSleep() })).resolves.toEqual([]);
  });

  it("retries a rate-limited batch with a linearly growing wait", async () => {
    let failuresLeft = 2;
    const flaky = Pipeline.from("flaky", (n: number) => {
      if (n === 1 && failuresLeft > 0) {
        failuresLeft--;
        throw new RateLimitedError();
      }
      return n;
    });
    const sleep = noSleep();

    const results = await batchInvokeWithRetry(flaky, range(1, 5), { sleep });

    expect(results).toEqual([[1, 2, 3, 4, 5]]);
    expect(sleep.mock.calls).toEqual([[60_000], [120_000]]);
  });

  it("drops a batch after maxRetries and continues with the next one", async () => {
    const failing = Pipeline.from("failing", (n: number) => {
      if (n === 1) throw new RateLimitedError();
      return n;
    });
    const sleep = noSleep();
    const logger = createSilentLogger();
    const errorSpy = vi.spyOn(logger, "error");

    const results = await batchInvokeWithRetry(failing, range(1, 40), {
      maxRetries: 2,
      sleep,
      logger,
    });

    expect(results).toEqual([range(31, 40)]);
    expect(sleep.mock.calls).toEqual([[60_000], [120_000]]);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("propagates errors other than rate limits without retrying", async () => {
    const broken = Pipeline.from("broken", () => {
      throw new ExternalServiceError("openai request failed", "openai");
    });
    const sleep = noSleep();

    await expect(batchInvokeWithRetry(broken, range(1, 3), { sleep })).rejects.toBeInstanceOf(
      ExternalServiceError,
    );
    expect(sleep).not.toHaveBeenCalled();
  });
});

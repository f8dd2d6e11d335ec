import { describe, it, expect } from "vitest";
import { toProviderError } from "./provider-error.js";
import { ExternalServiceError, InvalidArgumentError, RateLimitedError } from "./errors.js";

class FakeApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
  }
}

describe("toProviderError", () => {
  it("maps status 429 to RateLimitedError", () => {
    const cause = new FakeApiError("Too many requests", 429);

    const mapped = toProviderError("openai", cause);

    expect(mapped).toBeInstanceOf(RateLimitedError);
    expect(mapped.message).toBe("openai rate limit exceeded");
    expect(mapped.cause).toBe(cause);
  });

  it("reads statusCode as well as status", () => {
    expect(toProviderError("cohere", { statusCode: 429 })).toBeInstanceOf(RateLimitedError);
  });

  it("maps other failures to ExternalServiceError", () => {
    const mapped = toProviderError("openai", new FakeApiError("Bad gateway", 502));

    expect(mapped).toBeInstanceOf(ExternalServiceError);
    expect(mapped.message).toBe("openai request failed: Bad gateway");
    expect(mapped.details).toEqual({ status: 502 });
    if (mapped instanceof ExternalServiceError) {
      expect(mapped.service).toBe("openai");
    }
  });

  it("maps network errors without a status", () => {
    const mapped = toProviderError("qdrant", new Error("ECONNREFUSED"));

    expect(mapped).toBeInstanceOf(ExternalServiceError);
    expect(mapped.details).toBeUndefined();
  });

  it("passes AppErrors through", () => {
    const original = new InvalidArgumentError("bad");

    expect(toProviderError("openai", original)).toBe(original);
  });
});

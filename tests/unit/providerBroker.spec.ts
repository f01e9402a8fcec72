import { APICallError } from "ai";
import { describe, expect, it } from "vitest";

import { classifyProviderError } from "../../src/agents/providers/errorClassification.js";
import { KeyRing } from "../../src/agents/providers/keyRing.js";
import { AllProvidersExhaustedError } from "../../src/domain/errors.js";
import { createTestRuntime, FakeLlmProvider, httpError, scripted } from "../helpers/fakeLlmProvider.js";

const MESSAGES = [{ role: "user" as const, content: "Say hello." }];

describe("classifyProviderError", () => {
  it("treats 429 and 403 as quota", () => {
    expect(classifyProviderError(httpError(429, "Too Many Requests"))).toBe("quota");
    expect(classifyProviderError(httpError(403, "Forbidden"))).toBe("quota");
  });

  it("treats 5xx, timeouts and connection resets as transient", () => {
    expect(classifyProviderError(httpError(503, "Service Unavailable"))).toBe("transient");
    expect(classifyProviderError(Object.assign(new Error("The operation timed out."), { name: "TimeoutError" }))).toBe(
      "transient"
    );
    expect(classifyProviderError(Object.assign(new Error("request failed"), { cause: { code: "ECONNRESET" } }))).toBe(
      "transient"
    );
  });

  it("treats other 4xx and unknown errors as client errors", () => {
    expect(classifyProviderError(httpError(400, "Bad Request"))).toBe("client");
    expect(classifyProviderError(httpError(401, "Unauthorized"))).toBe("client");
    expect(classifyProviderError(new Error("boom"))).toBe("client");
  });

  it("recognises quota wording without a status code", () => {
    expect(classifyProviderError(new Error("Resource has been exhausted (check quota)."))).toBe("quota");
  });

  it("reads the status of SDK call errors", () => {
    const error = new APICallError({
      message: "Rate limit exceeded",
      url: "https://llm.test/v1/chat",
      requestBodyValues: {},
      statusCode: 429
    });

    expect(classifyProviderError(error)).toBe("quota");
  });
});

describe("KeyRing", () => {
  it("skips exhausted keys and reports null once all are spent", () => {
    const ring = new KeyRing(["test-key-a", "test-key-b"]);

    ring.markExhausted("test-key-a");
    expect(ring.current()).toBe("test-key-b");

    ring.markExhausted("test-key-b");
    expect(ring.current()).toBeNull();
    expect(ring.exhaustedKeys()).toEqual(["test-key-a", "test-key-b"]);
  });
});

describe("ProviderBroker", () => {
  it("makes exactly maxRetries attempts with non-decreasing delays before giving up", async () => {
    const limited = new FakeLlmProvider("gemini", () => httpError(429, "Too Many Requests"));
    const { broker, sleeps } = createTestRuntime([limited], 3);

    await expect(broker.call(MESSAGES, 100)).rejects.toBeInstanceOf(AllProvidersExhaustedError);
    expect(limited.calls).toHaveLength(3);
    expect(sleeps).toEqual([1000, 2000]);
  });

  it("does not mark a key exhausted on a 400", async () => {
    const rejecting = new FakeLlmProvider("openrouter", () => httpError(400, "Bad Request"), {
      apiKeys: ["test-key-a", "test-key-b"],
      pooled: true
    });
    const { broker, sleeps } = createTestRuntime([rejecting]);

    await expect(broker.call(MESSAGES, 100)).rejects.toBeInstanceOf(AllProvidersExhaustedError);
    expect(rejecting.calls).toHaveLength(1);
    expect(broker.exhaustedKeys("openrouter")).toEqual([]);
    expect(sleeps).toEqual([]);
  });

  it("marks the current pooled key exhausted on a 429 and rotates to the next", async () => {
    const pooled = new FakeLlmProvider("openrouter", scripted([httpError(429, "Too Many Requests"), "hello"]), {
      apiKeys: ["test-key-a", "test-key-b"],
      pooled: true
    });
    const { broker } = createTestRuntime([pooled]);

    await expect(broker.call(MESSAGES, 100)).resolves.toBe("hello");
    expect(broker.exhaustedKeys("openrouter")).toEqual(["test-key-a"]);
    expect(pooled.calls.map((call) => call.apiKey)).toEqual(["test-key-a", "test-key-b"]);
  });

  it("rotates without marking on a transient error", async () => {
    const flaky = new FakeLlmProvider(
      "openrouter",
      scripted([Object.assign(new Error("socket hang up"), { name: "FetchError" }), "hello"]),
      { apiKeys: ["test-key-a", "test-key-b"], pooled: true }
    );
    const { broker } = createTestRuntime([flaky]);

    await expect(broker.call(MESSAGES, 100)).resolves.toBe("hello");
    expect(broker.exhaustedKeys("openrouter")).toEqual([]);
    expect(flaky.calls.map((call) => call.apiKey)).toEqual(["test-key-a", "test-key-b"]);
  });

  it("fails over to the next provider when the first is rate limited", async () => {
    const first = new FakeLlmProvider("openrouter", () => httpError(429, "Too Many Requests"), {
      apiKeys: ["test-key-a", "test-key-b"],
      pooled: true
    });
    const second = new FakeLlmProvider("ollama", () => "from the second provider");
    const { broker, sleeps } = createTestRuntime([first, second], 3);

    const completion = await broker.complete(MESSAGES, 100);

    expect(completion.text).toBe("from the second provider");
    expect(completion.provider).toBe("ollama");
    expect(completion.attempts).toBe(3);
    expect(broker.exhaustedKeys("openrouter")).toEqual(["test-key-a", "test-key-b"]);
    expect(first.calls).toHaveLength(2);
    expect(sleeps.reduce((total, ms) => total + ms, 0)).toBeLessThanOrEqual(3 * 1000 * 3);
  });

  it("treats an empty reply as a client error and moves on", async () => {
    const silent = new FakeLlmProvider("gemini", () => "   ");
    const backup = new FakeLlmProvider("groq", () => "backup answer");
    const { broker } = createTestRuntime([silent, backup]);

    await expect(broker.call(MESSAGES, 100)).resolves.toBe("backup answer");
    expect(silent.calls).toHaveLength(1);
  });

  it("stays idle-stable across repeated successful calls", async () => {
    const healthy = new FakeLlmProvider("openrouter", () => "fine", {
      apiKeys: ["test-key-a", "test-key-b"],
      pooled: true
    });
    const { broker, sleeps } = createTestRuntime([healthy]);

    await expect(broker.call(MESSAGES, 100)).resolves.toBe("fine");
    await expect(broker.call(MESSAGES, 100)).resolves.toBe("fine");
    expect(broker.exhaustedKeys("openrouter")).toEqual([]);
    expect(healthy.calls.map((call) => call.apiKey)).toEqual(["test-key-a", "test-key-a"]);
    expect(sleeps).toEqual([]);
  });

  it("passes token budget, temperature and timeout to the provider", async () => {
    const provider = new FakeLlmProvider("gemini", () => "ok");
    const { broker } = createTestRuntime([provider]);

    await broker.call(MESSAGES, 321, 0.7);

    expect(provider.calls[0]?.request).toMatchObject({ maxTokens: 321, temperature: 0.7, timeoutMs: 5000 });
  });
});

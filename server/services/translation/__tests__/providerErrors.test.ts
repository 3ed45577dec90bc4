import { describe, test } from "node:test";
import assert from "node:assert/strict";

import { QuotaExceededError, TransientProviderError } from "../../../errors";
import { OpenAITranslationProvider, type ChatCompletionClient } from "../providers/openaiProvider";
import { classifyProviderError } from "../providers/providerErrors";

const apiError = (message: string, fields: Record<string, unknown>) =>
  Object.assign(new Error(message), fields);

describe("classifyProviderError", () => {
  test("quota exhaustion is not retried", () => {
    const error = classifyProviderError(
      apiError("You exceeded your current quota", {
        status: 429,
        code: "insufficient_quota",
        headers: { "retry-after": "30" },
      }),
    );
    assert.ok(error instanceof QuotaExceededError);
    assert.equal(error.retryAfterMs, 30_000);
  });

  test("rate limits and server errors are transient", () => {
    const limited = classifyProviderError(apiError("Rate limit reached", { status: 429 }));
    assert.ok(limited instanceof TransientProviderError);
    assert.equal(limited.status, 429);

    assert.ok(classifyProviderError(apiError("Bad gateway", { status: 502 })) instanceof TransientProviderError);
    assert.ok(classifyProviderError(apiError("Overloaded", { status: 529 })) instanceof TransientProviderError);
  });

  test("network failures without a status are transient", () => {
    const error = classifyProviderError(new Error("socket hang up"));
    assert.ok(error instanceof TransientProviderError);
    assert.equal(error.status, null);
  });

  test("client errors are not recoverable", () => {
    assert.equal(classifyProviderError(apiError("Invalid API key", { status: 401 })), null);
    assert.equal(classifyProviderError(apiError("Unknown model", { status: 404 })), null);
    assert.equal(classifyProviderError("something odd"), null);
  });
});

describe("OpenAITranslationProvider", () => {
  type CreateCall = Parameters<ChatCompletionClient["chat"]["completions"]["create"]>;

  const fakeClient = (reply: () => Promise<string | null>) => {
    const calls: CreateCall[] = [];
    const client: ChatCompletionClient = {
      chat: {
        completions: {
          create: async (...args) => {
            calls.push(args);
            return { choices: [{ message: { content: await reply() } }] };
          },
        },
      },
    };
    return { client, calls };
  };

  test("sends the prompts and returns the completion text", async () => {
    const { client, calls } = fakeClient(async () => "Thus have I heard.");
    const provider = new OpenAITranslationProvider({ client, model: "test-model", timeoutMs: 5_000 });

    const result = await provider.translate({
      text: "Evaṃ me sutaṃ.",
      targetLanguage: "english",
      context: "dn/sila/dn1/1#body",
    });

    assert.equal(provider.name, "openai:test-model");
    assert.deepEqual(result, { ok: true, text: "Thus have I heard." });
    const [body, options] = calls[0];
    assert.equal(body.model, "test-model");
    assert.equal(body.temperature, 0.2);
    assert.deepEqual(
      body.messages.map((message) => message.role),
      ["system", "user"],
    );
    assert.equal(
      body.messages[1].content,
      "Location in the corpus: dn/sila/dn1/1#body\n\nPali text:\nEvaṃ me sutaṃ.",
    );
    assert.deepEqual(options, { timeout: 5_000 });
  });

  test("an empty completion becomes an empty string", async () => {
    const { client } = fakeClient(async () => null);
    const provider = new OpenAITranslationProvider({ client, model: "test-model", timeoutMs: 5_000 });
    const result = await provider.translate({ text: "x", targetLanguage: "sinhala", context: null });
    assert.deepEqual(result, { ok: true, text: "" });
  });

  test("recoverable failures come back as results", async () => {
    const { client } = fakeClient(async () => {
      throw apiError("Rate limit reached", { status: 429 });
    });
    const provider = new OpenAITranslationProvider({ client, model: "test-model", timeoutMs: 5_000 });

    const result = await provider.translate({ text: "x", targetLanguage: "english", context: null });
    assert.equal(result.ok, false);
    if (!result.ok) assert.ok(result.error instanceof TransientProviderError);
  });

  test("other failures are rethrown", async () => {
    const { client } = fakeClient(async () => {
      throw apiError("Invalid API key", { status: 401 });
    });
    const provider = new OpenAITranslationProvider({ client, model: "test-model", timeoutMs: 5_000 });

    await assert.rejects(
      provider.translate({ text: "x", targetLanguage: "english", context: null }),
      /Invalid API key/,
    );
  });
});

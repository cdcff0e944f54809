import { afterEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { loadConfig } from "../src/config/env.js";
import { DefaultAiClient } from "../src/infra/ai/defaultAiClient.js";
import { OllamaClient } from "../src/infra/ai/ollamaClient.js";
import { OpenAiClient } from "../src/infra/ai/openAiClient.js";
import { buildAnswerMessages } from "../src/infra/ai/prompt.js";

const ollamaBodySchema = z.object({ prompt: z.string() });

describe("OpenAiClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns embeddings in input order", async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({
        data: [
          { embedding: [0.2], index: 1 },
          { embedding: [0.1], index: 0 },
        ],
      }),
    );
    const client = createOpenAiClient();

    expect(await client.embedTexts(["a", "b"])).toEqual([[0.1], [0.2]]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe("https://api.openai.com/v1/embeddings");
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-secret");
  });

  it("trims the chat answer and maps empty content to null", async () => {
    stubFetch(() => jsonResponse({ choices: [{ message: { content: "  Halo!  " } }] }));
    const client = createOpenAiClient();
    expect(await client.generateAnswer({ question: "q", context: "c", category: "profil" })).toBe(
      "Halo!",
    );

    stubFetch(() => jsonResponse({ choices: [{ message: { content: "" } }] }));
    expect(await client.generateAnswer({ question: "q", context: "c", category: "profil" })).toBeNull();
  });

  it("surfaces http errors", async () => {
    stubFetch(() => new Response("boom", { status: 500 }));
    const client = createOpenAiClient();

    await expect(
      client.generateAnswer({ question: "q", context: "c", category: "profil" }),
    ).rejects.toThrow("OpenAI chat failed (500): boom");
  });

  it("refuses to call out without a key", async () => {
    const client = new OpenAiClient({ apiKey: null, embeddingModel: "m", chatModel: "c" });
    expect(client.isConfigured()).toBe(false);
    await expect(client.embedQuery("python")).rejects.toThrow(
      "OPENAI_API_KEY is required for OpenAI operations.",
    );
  });
});

describe("OllamaClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("embeds each text and keeps input order", async () => {
    stubFetch((init) => {
      const body = ollamaBodySchema.parse(JSON.parse(String(init?.body)));
      return jsonResponse({ embedding: [body.prompt.length] });
    });
    const client = new OllamaClient({
      baseUrl: "http://127.0.0.1:11434",
      chatModel: "chat",
      embeddingModel: "embed",
    });

    expect(await client.embedTexts(["a", "bbb", "cc", "dddd", "eeeee"])).toEqual([
      [1],
      [3],
      [2],
      [4],
      [5],
    ]);
  });

  it("rejects an empty embedding", async () => {
    stubFetch(() => jsonResponse({}));
    const client = new OllamaClient({
      baseUrl: "http://127.0.0.1:11434",
      chatModel: "chat",
      embeddingModel: "embed",
    });

    await expect(client.embedQuery("python")).rejects.toThrow(
      "Ollama embeddings returned empty vector.",
    );
  });
});

describe("DefaultAiClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("generates nothing in template mode", async () => {
    const fetchMock = stubFetch(() => jsonResponse({}));
    const client = new DefaultAiClient(loadConfig({}));

    expect(client.isEmbeddingConfigured()).toBe(false);
    expect(client.getAnswerMode()).toBe("template");
    expect(await client.generateAnswer({ question: "q", context: "c", category: "profil" })).toBeNull();
    expect(await client.embedTexts(["python"])).toEqual([]);
    await expect(client.embedQuery("python")).rejects.toThrow("Embedding provider is disabled.");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("routes to the configured provider", async () => {
    stubFetch(() => jsonResponse({ message: { content: "jawaban" } }));
    const client = new DefaultAiClient(
      loadConfig({ EMBEDDING_PROVIDER: "ollama", ANSWER_MODE: "ollama" }),
    );

    expect(client.isEmbeddingConfigured()).toBe(true);
    expect(client.getEmbeddingModelId()).toBe("ollama/nomic-embed-text");
    expect(
      new DefaultAiClient(
        loadConfig({ OPENAI_API_KEY: "test-secret", OPENAI_EMBEDDING_MODEL: "text-embedding-3-large" }),
      ).getEmbeddingModelId(),
    ).toBe("openai/text-embedding-3-large");
    expect(await client.generateAnswer({ question: "q", context: "c", category: "profil" })).toBe(
      "jawaban",
    );
  });
});

describe("answer prompt", () => {
  it("asks for the question's language and marks missing context", () => {
    const [system, user] = buildAnswerMessages({
      question: "proyek apa yang pernah kamu buat?",
      context: "",
      category: "proyek",
    });

    expect(system.content).toContain("Respond only in Indonesian.");
    expect(user.content).toBe(
      "Topic: proyek\n\nQuestion:\nproyek apa yang pernah kamu buat?\n\nContext:\n(no context)",
    );
    const [englishSystem] = buildAnswerMessages({
      question: "what do you build",
      context: "x",
      category: "proyek",
    });
    expect(englishSystem.content).toContain("Respond only in English.");
  });
});

function createOpenAiClient(): OpenAiClient {
  return new OpenAiClient({
    apiKey: "test-secret",
    embeddingModel: "text-embedding-3-small",
    chatModel: "gpt-4o-mini",
  });
}

function stubFetch(respond: (init?: RequestInit) => Response) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, init?: RequestInit) =>
    respond(init),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}

import { RequestInit, Response } from "node-fetch";
import { PromptRecord, parsePromptRecord } from "../src/core/entities/PromptRecord.js";
import { AnthropicBackend, readAnthropicSettings } from "../src/infrastructure/backends/AnthropicBackend.js";
import { BackendRegistry } from "../src/infrastructure/backends/BackendRegistry.js";
import { Env, modelIdentifier, readScopedVariable, scopedValue } from "../src/infrastructure/backends/environment.js";
import { createBackendRegistry } from "../src/infrastructure/backends/index.js";
import { OllamaBackend, readOllamaSettings } from "../src/infrastructure/backends/OllamaBackend.js";
import { OpenAIBackend, readHuggingfaceTgiSettings, readOpenAISettings } from "../src/infrastructure/backends/OpenAIBackend.js";
import { QuartBackend, readQuartSettings } from "../src/infrastructure/backends/QuartBackend.js";
import { TEST_ERROR, TEST_RESPONSE, TestBackend } from "../src/infrastructure/backends/TestBackend.js";
import { HttpClient } from "../src/infrastructure/http/HttpClient.js";

interface SentRequest {
  url: string;
  body: Record<string, unknown>;
  headers: unknown;
}

/**
 * In-process stand-in for node-fetch answering from a list of canned replies
 */
function fakeHttp(replies: Array<{ status?: number; body: unknown }>) {
  const sent: SentRequest[] = [];
  const transport = jest.fn(async (url: string, init: RequestInit) => {
    sent.push({ url, body: JSON.parse(String(init.body)), headers: init.headers });
    const reply = replies.shift() ?? { status: 500, body: { error: "no reply scripted" } };
    const text = typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body);
    return new Response(text, { status: reply.status ?? 200 });
  });
  return { http: new HttpClient(1000, transport), sent, transport };
}

function record(fields: Record<string, unknown>): PromptRecord {
  return parsePromptRecord(JSON.stringify(fields), 1, "job.jsonl");
}

describe("Backends", () => {
  describe("environment helpers", () => {
    test("should build model identifiers", () => {
      expect(modelIdentifier("meta-llama/Llama-3.1:8b instruct")).toBe("meta_llama_Llama_3_1_8b_instruct");
    });

    test("should prefer model-specific values", () => {
      const env: Env = { OLLAMA_API_ENDPOINT: "http://default:11434", OLLAMA_API_ENDPOINT_llama3_2: "http://gpu:11434" };
      const variable = readScopedVariable(env, "OLLAMA_API_ENDPOINT");

      expect(scopedValue(variable, "llama3.2")).toBe("http://gpu:11434");
      expect(scopedValue(variable, "mistral")).toBe("http://default:11434");
      expect(scopedValue(variable)).toBe("http://default:11434");
    });
  });

  describe("BackendRegistry", () => {
    test("should disable adapters whose required environment is missing", () => {
      const registry = createBackendRegistry({ env: { OPENAI_API_KEY: "test-secret" }, http: new HttpClient() });

      expect(registry.lookup("test").status).toBe("ready");
      expect(registry.lookup("openai").status).toBe("ready");
      expect(registry.lookup("ollama").status).toBe("disabled");
      expect(registry.lookup("gemini").status).toBe("unknown");
      expect(registry.apiNames()).toEqual(["test", "ollama", "openai", "huggingface-tgi", "anthropic", "quart"]);

      const ollama = registry.environmentReport().find((report) => report.apiName === "ollama");
      expect(ollama?.issues).toEqual([{ severity: "fatal", message: "Environment variable OLLAMA_API_ENDPOINT is not set" }]);
    });

    test("should refuse duplicate api names", () => {
      expect(() => new BackendRegistry([new TestBackend(), new TestBackend()])).toThrow("Duplicate backend adapter for api 'test'");
    });
  });

  describe("TestBackend", () => {
    test("should follow raise_error", async () => {
      const backend = new TestBackend();

      await expect(backend.query(record({ prompt: "x", parameters: { raise_error: "False" } }), 1)).resolves.toEqual({
        ok: true,
        response: TEST_RESPONSE,
      });
      await expect(backend.query(record({ prompt: "x", parameters: { raise_error: "True" } }), 1)).resolves.toEqual({
        ok: false,
        failure: { kind: "backend", message: TEST_ERROR, retryable: true },
      });
      await expect(
        backend.query(record({ prompt: "x", parameters: { raise_error: "True", raise_error_type: "permanent" } }), 1)
      ).resolves.toMatchObject({ ok: false, failure: { retryable: false } });
    });

    test("should fail about one in five requests otherwise", async () => {
      const rolls = [0.1, 0.5];
      const backend = new TestBackend({ responseDelayMs: 0 }, undefined, () => rolls.shift() ?? 0.9);

      await expect(backend.query(record({ prompt: "x" }), 1)).resolves.toMatchObject({ ok: false });
      await expect(backend.query(record({ prompt: "x" }), 2)).resolves.toMatchObject({ ok: true });
    });
  });

  describe("OllamaBackend", () => {
    const env: Env = { OLLAMA_API_ENDPOINT: "http://localhost:11434", OLLAMA_API_ENDPOINT_llama3_2: "http://gpu-box:11434" };

    test("should generate from plain text on the model's endpoint", async () => {
      const { http, sent } = fakeHttp([{ body: { model: "llama3.2", response: "Paris" } }]);
      const backend = new OllamaBackend(readOllamaSettings(env), http);

      const result = await backend.query(
        record({ api: "ollama", model_name: "llama3.2", prompt: "Capital of France?", parameters: { temperature: 0 } }),
        1
      );

      expect(result).toEqual({ ok: true, response: "Paris" });
      expect(sent[0].url).toBe("http://gpu-box:11434/api/generate");
      expect(sent[0].body).toEqual({ model: "llama3.2", prompt: "Capital of France?", stream: false, options: { temperature: 0 } });
    });

    test("should send scripted turns one at a time with the history", async () => {
      const { http, sent } = fakeHttp([
        { body: { message: { role: "assistant", content: "Hello!" } } },
        { body: { message: { role: "assistant", content: "Fine, thanks." } } },
      ]);
      const backend = new OllamaBackend(readOllamaSettings(env), http);

      const result = await backend.query(record({ api: "ollama", model_name: "mistral", prompt: ["Hi", "How are you?"] }), 1);

      expect(result).toEqual({ ok: true, response: ["Hello!", "Fine, thanks."] });
      expect(sent.map((request) => request.url)).toEqual([
        "http://localhost:11434/api/chat",
        "http://localhost:11434/api/chat",
      ]);
      expect(sent[1].body.messages).toEqual([
        { role: "user", content: "Hi" },
        { role: "assistant", content: "Hello!" },
        { role: "user", content: "How are you?" },
      ]);
    });

    test("should not retry a model that is not pulled", async () => {
      const { http } = fakeHttp([{ status: 404, body: { error: "model 'phi' not found, try pulling it first" } }]);
      const backend = new OllamaBackend(readOllamaSettings(env), http);

      const result = await backend.query(record({ api: "ollama", model_name: "phi", prompt: "x" }), 1);

      expect(result).toMatchObject({ ok: false, failure: { kind: "backend", retryable: false } });
    });

    test("should report a retryable HTTP failure", async () => {
      const { http } = fakeHttp([{ status: 503, body: "busy" }]);
      const backend = new OllamaBackend(readOllamaSettings(env), http);

      const result = await backend.query(record({ api: "ollama", model_name: "phi", prompt: "x" }), 1);

      expect(result).toEqual({ ok: false, failure: { kind: "http", message: "HTTP error! status: 503 - busy", retryable: true } });
    });

    test("should flag unusable records before sending", () => {
      const backend = new OllamaBackend(readOllamaSettings({}), new HttpClient());
      const issues = backend.checkPromptShape(record({ api: "ollama", prompt: [{ type: "image", media: "a.png" }] }));

      expect(issues.map((issue) => issue.message)).toEqual([
        "Ollama prompts must be a string or a list of turns",
        "Ollama records need a 'model_name'",
        "Environment variable OLLAMA_API_ENDPOINT is not set",
      ]);
    });
  });

  describe("OpenAIBackend", () => {
    test("should post chat completions with the bearer key and parameters", async () => {
      const { http, sent } = fakeHttp([{ body: { choices: [{ message: { role: "assistant", content: "42" } }] } }]);
      const backend = new OpenAIBackend(readOpenAISettings({ OPENAI_API_KEY: "test-secret" }), http);

      const result = await backend.query(
        record({
          api: "openai",
          model_name: "gpt-4o-mini",
          prompt: [{ role: "system", content: "Answer briefly" }, { role: "user", content: "Meaning of life?" }],
          parameters: { temperature: 0.5 },
        }),
        1
      );

      expect(result).toEqual({ ok: true, response: "42" });
      expect(sent[0].url).toBe("https://api.openai.com/v1/chat/completions");
      expect(sent[0].headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
      expect(sent[0].body).toEqual({
        temperature: 0.5,
        model: "gpt-4o-mini",
        messages: [
          { role: "system", content: "Answer briefly" },
          { role: "user", content: "Meaning of life?" },
        ],
      });
    });

    test("should send multimodal parts as one user message", async () => {
      const { http, sent } = fakeHttp([{ body: { choices: [{ message: { content: "A cat" } }] } }]);
      const backend = new OpenAIBackend(readOpenAISettings({ OPENAI_API_KEY: "test-secret" }), http);
      const parts = [{ type: "text", text: "What is this?" }, { type: "image_url", image_url: { url: "https://example.com/cat.png" } }];

      await backend.query(record({ api: "openai", model_name: "gpt-4o", prompt: parts }), 1);

      expect(sent[0].body.messages).toEqual([{ role: "user", content: parts }]);
    });

    test("should report an unexpected body as a backend failure", async () => {
      const { http } = fakeHttp([{ body: { choices: [] } }]);
      const backend = new OpenAIBackend(readOpenAISettings({ OPENAI_API_KEY: "test-secret" }), http);

      const result = await backend.query(record({ api: "openai", model_name: "gpt-4o", prompt: "x" }), 1);

      expect(result).toMatchObject({ ok: false, failure: { kind: "backend", retryable: true } });
    });

    test("should talk to a TGI endpoint under /v1 without a key", async () => {
      const { http, sent } = fakeHttp([{ body: { choices: [{ message: { content: "hi" } }] } }]);
      const settings = readHuggingfaceTgiSettings({ HUGGINGFACE_TGI_API_ENDPOINT: "http://tgi:8080/" });
      const backend = new OpenAIBackend(settings, http);

      expect(backend.apiName).toBe("huggingface-tgi");
      expect(backend.checkEnvironment()).toEqual([
        { severity: "advisory", message: "Optional environment variable HUGGINGFACE_TGI_API_KEY is not set" },
      ]);
      await backend.query(record({ api: "huggingface-tgi", prompt: "hello" }), 1);

      expect(sent[0].url).toBe("http://tgi:8080/v1/chat/completions");
      expect(sent[0].body.model).toBe("tgi");
      expect(sent[0].headers).toEqual({ "Content-Type": "application/json" });
    });
  });

  describe("AnthropicBackend", () => {
    test("should lift system turns and join text blocks", async () => {
      const { http, sent } = fakeHttp([{ body: { content: [{ type: "text", text: "Bonjour" }, { type: "text", text: "!" }] } }]);
      const backend = new AnthropicBackend(readAnthropicSettings({ ANTHROPIC_API_KEY: "test-secret" }), http);

      const result = await backend.query(
        record({
          api: "anthropic",
          model_name: "claude-3-haiku",
          prompt: [{ role: "system", content: "Reply in French" }, { role: "user", content: "Hello" }],
          parameters: { max_tokens: 50, temperature: 1 },
        }),
        1
      );

      expect(result).toEqual({ ok: true, response: "Bonjour!" });
      expect(sent[0].url).toBe("https://api.anthropic.com/v1/messages");
      expect(sent[0].headers).toEqual({
        "Content-Type": "application/json",
        "x-api-key": "test-secret",
        "anthropic-version": "2023-06-01",
      });
      expect(sent[0].body).toEqual({
        temperature: 1,
        model: "claude-3-haiku",
        max_tokens: 50,
        system: "Reply in French",
        messages: [{ role: "user", content: "Hello" }],
      });
    });
  });

  describe("QuartBackend", () => {
    test("should post text and read the generated text", async () => {
      const { http, sent } = fakeHttp([{ body: { response: [{ generated_text: "once upon a time" }] } }]);
      const backend = new QuartBackend(readQuartSettings({ QUART_API_ENDPOINT: "http://localhost:8000" }), http);

      const result = await backend.query(record({ api: "quart", model_name: "gpt2", prompt: "Tell a story", parameters: { max_new_tokens: 20 } }), 1);

      expect(result).toEqual({ ok: true, response: "once upon a time" });
      expect(sent[0].url).toBe("http://localhost:8000/generate");
      expect(sent[0].body).toEqual({ text: "Tell a story", model: "gpt2", options: { max_new_tokens: 20 } });
    });

    test("should only accept plain text", () => {
      const backend = new QuartBackend(readQuartSettings({ QUART_API_ENDPOINT: "http://localhost:8000" }), new HttpClient());

      expect(backend.checkPromptShape(record({ api: "quart", prompt: ["a", "b"] }))).toEqual([
        { severity: "fatal", message: "Quart prompts must be a string" },
      ]);
    });
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import axios, { type AxiosResponse } from "axios";
import { createChatEnhancer } from "../enhancer.js";

vi.mock("axios", () => ({ default: { post: vi.fn() } }));

const post = vi.mocked(axios.post);

function reply(data: unknown): AxiosResponse {
  return { data } as AxiosResponse;
}

describe("createChatEnhancer", () => {
  beforeEach(() => {
    post.mockReset();
    vi.stubEnv("OPENAI_API_KEY", "test-key");
    vi.stubEnv("OPENAI_BASE_URL", "https://llm.example/");
    vi.stubEnv("OPENAI_MODEL", "test-model");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("makes no request without an API key", async () => {
    vi.stubEnv("OPENAI_API_KEY", "");
    const enhancer = createChatEnhancer();
    expect(await enhancer.summarize("Some text.")).toBeNull();
    expect(post).not.toHaveBeenCalled();
  });

  it("posts a chat completion and returns the trimmed content", async () => {
    post.mockResolvedValue(reply({ choices: [{ message: { content: "  A short summary.  " } }] }));
    const enhancer = createChatEnhancer();

    expect(await enhancer.summarize("Body text.")).toBe("A short summary.");
    expect(post).toHaveBeenCalledTimes(1);
    const [url, body, config] = post.mock.calls[0];
    expect(url).toBe("https://llm.example/v1/chat/completions");
    expect(body).toMatchObject({ model: "test-model", max_tokens: 120 });
    expect(config).toMatchObject({ headers: { Authorization: "Bearer test-key" } });
  });

  it("includes the vendor in the drawback prompt", async () => {
    post.mockResolvedValue(reply({ choices: [{ message: { content: "Vendor lock-in." } }] }));
    const enhancer = createChatEnhancer();

    expect(await enhancer.drawback({ title: "Launch", summary: "Details.", source: "Acme" })).toBe("Vendor lock-in.");
    const body = post.mock.calls[0][1] as { messages: Array<{ content: string }> };
    expect(body.messages[1].content).toContain("Vendor: Acme\nTitle: Launch\nSummary: Details.");
  });

  it("swallows transport errors", async () => {
    post.mockRejectedValue(new Error("connect ECONNREFUSED"));
    expect(await createChatEnhancer().drawback({ title: "Launch" })).toBeNull();
  });

  it("treats empty or malformed responses as no result", async () => {
    post.mockResolvedValueOnce(reply({ choices: [] }));
    post.mockResolvedValueOnce(reply({ choices: [{ message: { content: "   " } }] }));
    post.mockResolvedValueOnce(reply("not json"));
    const enhancer = createChatEnhancer();
    expect(await enhancer.summarize("a")).toBeNull();
    expect(await enhancer.summarize("b")).toBeNull();
    expect(await enhancer.summarize("c")).toBeNull();
  });
});

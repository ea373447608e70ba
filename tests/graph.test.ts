import { describe, it, expect, vi } from "vitest";
import type { Notifier } from "../src/email.js";
import {
  ConfigurationError,
  DeliveryFailed,
  EvidenceSourceUnavailable,
  MalformedModelOutput,
  ResearchRunError,
} from "../src/errors.js";
import { ResearchRunner, nextStep, routeResearch, type ResearchRunnerDeps } from "../src/graph.js";
import type { LanguageModelClient } from "../src/llm.js";
import { createLogger } from "../src/logger.js";
import type { SearchOptions, WebSearchProvider } from "../src/search.js";
import type { SearchResponse, SourceRecord } from "../src/sources.js";
import type { VideoSearchProvider } from "../src/youtube.js";

const logger = createLogger("silent");

const web = (url: string, title: string): SourceRecord => ({ title, url, content: `${title} snippet`, rawContent: "raw" });

function webProvider(...responses: SearchResponse[]) {
  const search = vi.fn(async (_query: string, _options?: SearchOptions): Promise<SearchResponse> => {
    const next = responses.shift();
    if (!next) throw new Error("no more canned web responses");
    return next;
  });
  const provider: WebSearchProvider = { name: "tavily", includeRawContent: true, search };
  return { provider, search };
}

function videoProvider(response: SearchResponse) {
  const search = vi.fn(async (_query: string): Promise<SearchResponse> => response);
  const provider: VideoSearchProvider = { search };
  return { provider, search };
}

function model(query: string, followUps: string[], summaries: string[]) {
  const generateJson = vi.fn(async (): Promise<unknown> => ({ follow_up_query: followUps.shift() }));
  generateJson.mockResolvedValueOnce({ query });
  const generateText = vi.fn(async () => summaries.shift() ?? "summary");
  const llm: LanguageModelClient = { generateJson, generateText };
  return { llm, generateJson, generateText };
}

function notifier() {
  const assertReady = vi.fn();
  const deliver = vi.fn(async (_topic: string, _summary: string) => {});
  const fake: Notifier = { assertReady, deliver };
  return { notifier: fake, assertReady, deliver };
}

async function runError(run: Promise<unknown>): Promise<ResearchRunError> {
  try {
    await run;
  } catch (error) {
    if (error instanceof ResearchRunError) return error;
    throw error;
  }
  throw new Error("expected the run to fail");
}

function runner(overrides: Partial<ResearchRunnerDeps> & Pick<ResearchRunnerDeps, "llm" | "webSearch">) {
  return new ResearchRunner({ notifier: notifier().notifier, logger, maxLoops: 0, ...overrides });
}

describe("routeResearch", () => {
  it("continues while the loop count is within the ceiling, inclusive", () => {
    expect(routeResearch(0, 1)).toBe("web_research");
    expect(routeResearch(1, 1)).toBe("web_research");
    expect(routeResearch(2, 1)).toBe("finalize");
  });

  it("finalizes after the first loop when the ceiling is zero", () => {
    expect(routeResearch(0, 0)).toBe("web_research");
    expect(routeResearch(1, 0)).toBe("finalize");
  });
});

describe("nextStep", () => {
  it("walks one research iteration in order", () => {
    const state = { loopCount: 0 };
    expect(nextStep("generate_query", state, 3)).toBe("web_research");
    expect(nextStep("web_research", state, 3)).toBe("video_research");
    expect(nextStep("video_research", state, 3)).toBe("summarize");
    expect(nextStep("summarize", state, 3)).toBe("reflect");
    expect(nextStep("reflect", state, 3)).toBe("web_research");
  });

  it("goes from reflection to delivery once the ceiling is passed", () => {
    const state = { loopCount: 4 };
    expect(nextStep("reflect", state, 3)).toBe("finalize");
    expect(nextStep("finalize", state, 3)).toBe("deliver");
    expect(nextStep("deliver", state, 3)).toBe("end");
  });
});

describe("ResearchRunner", () => {
  it("runs a single iteration and delivers when the ceiling is zero", async () => {
    const { llm, generateJson, generateText } = model(
      "solid-state battery electrolytes",
      ["sulfide electrolyte dendrite growth"],
      ["<think>outline</think>Solid-state batteries use solid electrolytes."]
    );
    const webSearch = webProvider({ results: [web("https://example.com/a", "Battery basics")] });
    const videoSearch = videoProvider({
      results: [{ title: "Video one", url: "https://www.youtube.com/watch?v=abc", content: "t", rawContent: "t" }],
    });
    const delivery = notifier();

    const output = await runner({
      llm,
      webSearch: webSearch.provider,
      videoSearch: videoSearch.provider,
      notifier: delivery.notifier,
    }).run({ topic: "solid-state batteries" });

    expect(webSearch.search).toHaveBeenCalledTimes(1);
    expect(webSearch.search).toHaveBeenCalledWith("solid-state battery electrolytes", { loopCount: 0 });
    expect(videoSearch.search).toHaveBeenCalledTimes(1);
    expect(generateText).toHaveBeenCalledTimes(1);
    // query generation plus one reflection
    expect(generateJson).toHaveBeenCalledTimes(2);

    const expected =
      "## Summary\n\nSolid-state batteries use solid electrolytes.\n\n### Sources:\n" +
      "* Battery basics : https://example.com/a\n" +
      "* Video one : https://www.youtube.com/watch?v=abc";
    expect(output).toEqual({ summary: expected });
    expect(delivery.deliver).toHaveBeenCalledTimes(1);
    expect(delivery.deliver).toHaveBeenCalledWith("solid-state batteries", expected);
  });

  it("keeps every citation across iterations", async () => {
    const { llm } = model("first query", ["second query", "unused"], ["first summary", "second summary"]);
    const webSearch = webProvider(
      { results: [web("https://a.example", "A"), web("https://b.example", "B")] },
      { results: [web("https://a.example", "A"), web("https://c.example", "C"), web("https://d.example", "D")] }
    );

    const { summary } = await runner({ llm, webSearch: webSearch.provider, maxLoops: 1 }).run({
      topic: "quantum dots",
    });

    expect(webSearch.search).toHaveBeenCalledTimes(2);
    expect(webSearch.search).toHaveBeenNthCalledWith(2, "second query", { loopCount: 1 });
    expect(summary.startsWith("## Summary\n\nsecond summary\n\n### Sources:\n")).toBe(true);
    expect(summary.split("### Sources:\n")[1].split("\n")).toEqual([
      "* A : https://a.example",
      "* B : https://b.example",
      "* A : https://a.example",
      "* C : https://c.example",
      "* D : https://d.example",
    ]);
  });

  it("passes the existing summary to later summarizations", async () => {
    const { llm, generateText } = model("first query", ["second query"], ["first summary", "second summary"]);
    const webSearch = webProvider({ results: [web("https://a.example", "A")] }, { results: [web("https://b.example", "B")] });

    await runner({ llm, webSearch: webSearch.provider, maxLoops: 1 }).run({ topic: "quantum dots" });

    expect(generateText).toHaveBeenCalledTimes(2);
    expect(generateText).toHaveBeenLastCalledWith({
      system: expect.any(String),
      prompt: expect.stringContaining("<Existing Summary> \n first summary \n <Existing Summary>"),
    });
  });

  it("aborts when the web path fails", async () => {
    const { llm, generateText } = model("first query", [], []);
    const search = vi.fn(async (): Promise<SearchResponse> => {
      throw new EvidenceSourceUnavailable("tavily", "HTTP 502 Bad Gateway", { status: 502 });
    });
    const delivery = notifier();

    const error = await runError(
      runner({
        llm,
        webSearch: { name: "tavily", includeRawContent: true, search },
        notifier: delivery.notifier,
      }).run({ topic: "quantum dots" })
    );

    expect(error.stage).toBe("web_research");
    expect(error.cause).toBeInstanceOf(EvidenceSourceUnavailable);
    expect(error.message).toBe("Research failed during web_research: tavily: HTTP 502 Bad Gateway");
    expect(generateText).not.toHaveBeenCalled();
    expect(delivery.deliver).not.toHaveBeenCalled();
  });

  it("continues without video evidence when the video path fails", async () => {
    const { llm, generateText } = model("first query", ["next"], ["summary text"]);
    const webSearch = webProvider({ results: [web("https://a.example", "A")] });
    const videoSearch = vi.fn(async (): Promise<SearchResponse> => {
      throw new EvidenceSourceUnavailable("youtube", "HTTP 403 Forbidden", { status: 403 });
    });

    const { summary } = await runner({
      llm,
      webSearch: webSearch.provider,
      videoSearch: { search: videoSearch },
    }).run({ topic: "quantum dots" });

    expect(videoSearch).toHaveBeenCalledTimes(1);
    expect(generateText).toHaveBeenCalledWith({
      system: expect.any(String),
      prompt: expect.stringContaining("<YouTube Search Results> \n  \n <YouTube Search Results>"),
    });
    expect(summary).toBe("## Summary\n\nsummary text\n\n### Sources:\n* A : https://a.example");
  });

  it("aborts on an unexpected error from the video path", async () => {
    const { llm, generateText } = model("first query", [], []);
    const webSearch = webProvider({ results: [web("https://a.example", "A")] });
    const videoSearch = vi.fn(async (): Promise<SearchResponse> => {
      throw new TypeError("Cannot read properties of undefined (reading 'items')");
    });

    const error = await runError(
      runner({ llm, webSearch: webSearch.provider, videoSearch: { search: videoSearch } }).run({ topic: "quantum dots" })
    );

    expect(error.stage).toBe("video_research");
    expect(error.cause).toBeInstanceOf(TypeError);
    expect(generateText).not.toHaveBeenCalled();
  });

  it("aborts before any research when delivery is not configured", async () => {
    const { llm, generateJson } = model("first query", [], []);
    const webSearch = webProvider();
    const assertReady = vi.fn(() => {
      throw new ConfigurationError("EMAIL_RECIPIENT is not configured");
    });

    const error = await runError(
      runner({
        llm,
        webSearch: webSearch.provider,
        notifier: { assertReady, deliver: vi.fn(async () => {}) },
      }).run({ topic: "quantum dots" })
    );

    expect(error.stage).toBe("configure");
    expect(error.cause).toBeInstanceOf(ConfigurationError);
    expect(generateJson).not.toHaveBeenCalled();
    expect(webSearch.search).not.toHaveBeenCalled();
  });

  it("aborts when the initial query cannot be parsed", async () => {
    const generateJson = vi.fn(async (): Promise<unknown> => ({ aspect: "no query here" }));
    const webSearch = webProvider();

    const error = await runError(
      runner({
        llm: { generateJson, generateText: vi.fn(async () => "") },
        webSearch: webSearch.provider,
      }).run({ topic: "quantum dots" })
    );

    expect(error.stage).toBe("generate_query");
    expect(error.cause).toBeInstanceOf(MalformedModelOutput);
    expect(webSearch.search).not.toHaveBeenCalled();
  });

  it("reports a failed delivery", async () => {
    const { llm } = model("first query", ["next"], ["summary text"]);
    const webSearch = webProvider({ results: [web("https://a.example", "A")] });
    const deliver = vi.fn(async () => {
      throw new DeliveryFailed("Could not send summary to team@example.com: connection refused");
    });

    const error = await runError(
      runner({
        llm,
        webSearch: webSearch.provider,
        notifier: { assertReady: vi.fn(), deliver },
      }).run({ topic: "quantum dots" })
    );

    expect(error.stage).toBe("deliver");
    expect(error.cause).toBeInstanceOf(DeliveryFailed);
    expect(deliver).toHaveBeenCalledTimes(1);
  });

  it("rejects a blank topic", async () => {
    const { llm } = model("first query", [], []);

    const error = await runError(runner({ llm, webSearch: webProvider().provider }).run({ topic: "   " }));

    expect(error.stage).toBe("input");
  });
});

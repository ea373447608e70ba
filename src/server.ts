import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import { VIDEO_TOKENS_PER_SOURCE, WEB_TOKENS_PER_SOURCE, type ResearchRunner } from "./graph.js";
import type { WebSearchProvider } from "./search.js";
import { deduplicateAndFormatSources, formatSources, type SearchResponse } from "./sources.js";
import type { VideoSearchProvider } from "./youtube.js";

function textResult(text: string) {
  return { content: [{ type: "text" as const, text }] };
}

function errorResult(error: unknown) {
  return { ...textResult(`Error: ${errorMessage(error)}`), isError: true };
}

export function renderEvidence(response: SearchResponse, tokensPerSource: number, includeRawContent: boolean): string {
  if (response.results.length === 0) return "No results found.";
  return (
    deduplicateAndFormatSources(response, tokensPerSource, includeRawContent) +
    `\n\n### Sources:\n${formatSources(response)}`
  );
}

// ============================================================================
// Server
// ============================================================================

export interface ResearchServerDeps {
  runner: Pick<ResearchRunner, "run">;
  webSearch: WebSearchProvider;
  /** Absent when no YouTube API key is configured. */
  videoSearch?: VideoSearchProvider;
  maxLoops: number;
}

export function createResearchServer({ runner, webSearch, videoSearch, maxLoops }: ResearchServerDeps): McpServer {
  const server = new McpServer({
    name: "web-video-research",
    version: "0.1.0",
  });

  // --------------------------------------------------------------------------
  // Tool 1: deep_research - Full research loop with email delivery
  // --------------------------------------------------------------------------

  server.tool(
    "deep_research",
    `Research a topic in iterative web and video search loops.

Each loop searches the web with the configured provider, collects YouTube
transcripts, folds the evidence into a running summary and reflects on it to
pick the next query. After the loop ceiling the summary is finalized with every
source gathered and emailed to the configured recipient.

Returns the finalized summary.`,
    {
      topic: z.string().min(1).describe("The research topic"),
      maxLoops: z.number().int().min(0).max(10).optional()
        .describe(`Loop ceiling for this run (default: ${maxLoops})`),
    },
    async ({ topic, maxLoops }) => {
      try {
        const { summary } = await runner.run({ topic, maxLoops });
        return textResult(summary);
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  // --------------------------------------------------------------------------
  // Tool 2: web_search - One call to the configured web provider
  // --------------------------------------------------------------------------

  server.tool(
    "web_search",
    `Search the web once with the configured provider (${webSearch.name}).

Returns deduplicated source blocks followed by a bullet list of sources.`,
    {
      query: z.string().min(1).describe("The search query string"),
    },
    async ({ query }) => {
      try {
        const response = await webSearch.search(query);
        return textResult(renderEvidence(response, WEB_TOKENS_PER_SOURCE, webSearch.includeRawContent));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  // --------------------------------------------------------------------------
  // Tool 3: video_search - YouTube search with transcripts
  // --------------------------------------------------------------------------

  server.tool(
    "video_search",
    `Search YouTube and fetch transcripts for the top videos (at most 3).

Requires YOUTUBE_API_KEY. Transcripts that cannot be fetched in time are
replaced with a short notice.`,
    {
      query: z.string().min(1).describe("The search query string"),
    },
    async ({ query }) => {
      if (!videoSearch) {
        return errorResult(new Error("YOUTUBE_API_KEY is not configured"));
      }
      try {
        const response = await videoSearch.search(query);
        return textResult(renderEvidence(response, VIDEO_TOKENS_PER_SOURCE, true));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  return server;
}

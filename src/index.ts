#!/usr/bin/env node
/**
 * Web & Video Research MCP Server
 *
 * Researches a topic in a bounded loop:
 * 1. Generate a search query from the topic
 * 2. Gather evidence from the configured web provider (Tavily or Perplexity)
 * 3. Gather YouTube videos and their transcripts
 * 4. Fold the evidence into a running summary
 * 5. Reflect on the summary to find a knowledge gap and a follow-up query
 * 6. Repeat until the loop ceiling is passed, then finalize and email the summary
 */

import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { loadConfig, type ResearchConfig } from "./config.js";
import { EmailNotifier } from "./email.js";
import { errorMessage } from "./errors.js";
import { ResearchRunner } from "./graph.js";
import { createOllamaClient } from "./llm.js";
import { createLogger, type Logger } from "./logger.js";
import { createWebSearchProvider } from "./search.js";
import { createResearchServer } from "./server.js";
import { YouTubeSearch } from "./youtube.js";

function buildServer(config: ResearchConfig, logger: Logger): McpServer {
  const webSearch = createWebSearchProvider(config);
  const videoSearch = config.youtubeApiKey
    ? new YouTubeSearch({
        apiKey: config.youtubeApiKey,
        logger,
        transcriptTimeoutMs: config.transcriptTimeoutMs,
      })
    : undefined;

  const runner = new ResearchRunner({
    llm: createOllamaClient(config),
    webSearch,
    videoSearch,
    notifier: new EmailNotifier(config, logger),
    logger,
    maxLoops: config.maxResearchLoops,
  });

  return createResearchServer({ runner, webSearch, videoSearch, maxLoops: config.maxResearchLoops });
}

// ============================================================================
// Server Initialization
// ============================================================================

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const server = buildServer(config, logger);

  if (!config.youtubeApiKey) {
    logger.warn("YOUTUBE_API_KEY not set, video research will be skipped");
  }
  if (!config.emailRecipient) {
    logger.warn("EMAIL_RECIPIENT not set, deep_research runs will fail before starting");
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info(
    { searchProvider: config.searchProvider, model: config.modelName, maxLoops: config.maxResearchLoops },
    "Web & Video Research MCP Server running"
  );
}

main().catch((error: unknown) => {
  console.error("Fatal error:", errorMessage(error));
  process.exit(1);
});

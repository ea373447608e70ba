import type { Notifier } from "./email.js";
import { EvidenceSourceUnavailable, ResearchRunError, errorMessage } from "./errors.js";
import type { LanguageModelClient } from "./llm.js";
import type { Logger } from "./logger.js";
import { finalizeSummary, generateQuery, reflectOnSummary, summarizeSources, type StepDeps } from "./research.js";
import type { WebSearchProvider } from "./search.js";
import { deduplicateAndFormatSources, formatSources, type SearchResponse } from "./sources.js";
import { createResearchState, type ResearchState } from "./state.js";
import type { VideoSearchProvider } from "./youtube.js";

// ============================================================================
// Research loop state machine
// ============================================================================

export type ResearchStep =
  | "generate_query"
  | "web_research"
  | "video_research"
  | "summarize"
  | "reflect"
  | "finalize"
  | "deliver"
  | "end";

export const WEB_TOKENS_PER_SOURCE = 1000;
export const VIDEO_TOKENS_PER_SOURCE = 500;

/**
 * Inclusive ceiling: with loopCount counted after each web step, the loop runs
 * maxLoops + 1 web iterations in total.
 */
export function routeResearch(loopCount: number, maxLoops: number): "web_research" | "finalize" {
  return loopCount <= maxLoops ? "web_research" : "finalize";
}

export function nextStep(step: ResearchStep, state: Pick<ResearchState, "loopCount">, maxLoops: number): ResearchStep {
  switch (step) {
    case "generate_query":
      return "web_research";
    case "web_research":
      return "video_research";
    case "video_research":
      return "summarize";
    case "summarize":
      return "reflect";
    case "reflect":
      return routeResearch(state.loopCount, maxLoops);
    case "finalize":
      return "deliver";
    case "deliver":
    case "end":
      return "end";
  }
}

export interface ResearchRunnerDeps {
  llm: LanguageModelClient;
  webSearch: WebSearchProvider;
  /** Video research is skipped when absent. */
  videoSearch?: VideoSearchProvider;
  notifier: Notifier;
  logger: Logger;
  maxLoops: number;
}

export interface ResearchInput {
  topic: string;
  /** Overrides the configured loop ceiling for this run. */
  maxLoops?: number;
}

export interface ResearchOutput {
  summary: string;
}

/**
 * Runs the research loop. Steps of a run execute strictly in sequence; each
 * call to `run` gets its own state.
 */
export class ResearchRunner {
  constructor(private readonly deps: ResearchRunnerDeps) {}

  async run(input: ResearchInput): Promise<ResearchOutput> {
    const topic = input.topic.trim();
    const maxLoops = input.maxLoops ?? this.deps.maxLoops;
    const logger = this.deps.logger.child({ topic });

    if (!topic) throw new ResearchRunError("input", new Error("topic must not be empty"));

    try {
      this.deps.notifier.assertReady();
    } catch (error) {
      logger.error({ err: errorMessage(error) }, "delivery is not configured");
      throw new ResearchRunError("configure", error);
    }

    const state = createResearchState(topic);
    const stepDeps: StepDeps = { llm: this.deps.llm, logger };
    logger.info({ maxLoops }, "research started");

    let step: ResearchStep = "generate_query";
    while (step !== "end") {
      logger.debug({ step, loopCount: state.loopCount }, "entering step");
      try {
        await this.execute(step, state, stepDeps);
      } catch (error) {
        logger.error({ step, loopCount: state.loopCount, err: errorMessage(error) }, "research aborted");
        throw new ResearchRunError(step, error);
      }
      step = nextStep(step, state, maxLoops);
    }

    logger.info({ loops: state.loopCount, delivered: state.delivered }, "research finished");
    return { summary: state.summary };
  }

  private async execute(step: ResearchStep, state: ResearchState, stepDeps: StepDeps): Promise<void> {
    switch (step) {
      case "generate_query":
        state.currentQuery = await generateQuery(state, stepDeps);
        return;
      case "web_research":
        await this.webResearch(state, stepDeps.logger);
        return;
      case "video_research":
        await this.videoResearch(state, stepDeps.logger);
        return;
      case "summarize":
        state.summary = await summarizeSources(state, stepDeps);
        return;
      case "reflect":
        state.currentQuery = await reflectOnSummary(state, stepDeps);
        return;
      case "finalize":
        state.summary = finalizeSummary(state);
        return;
      case "deliver":
        await this.deps.notifier.deliver(state.topic, state.summary);
        state.delivered = true;
        return;
      case "end":
        return;
    }
  }

  private async webResearch(state: ResearchState, logger: Logger): Promise<void> {
    const { webSearch } = this.deps;
    const response = await webSearch.search(state.currentQuery, { loopCount: state.loopCount });
    logger.info({ provider: webSearch.name, query: state.currentQuery, results: response.results.length }, "web search");

    state.webEvidence.push(
      deduplicateAndFormatSources(response, WEB_TOKENS_PER_SOURCE, webSearch.includeRawContent, {
        onMissingRawContent: (source) => logger.warn({ url: source.url }, "no raw content found for source"),
      })
    );
    state.citations.push(formatSources(response));
    state.loopCount += 1;
  }

  private async videoResearch(state: ResearchState, logger: Logger): Promise<void> {
    const { videoSearch } = this.deps;
    if (!videoSearch) {
      logger.warn("video research skipped: no YouTube API key configured");
      return;
    }

    let response: SearchResponse;
    try {
      response = await videoSearch.search(state.currentQuery);
    } catch (error) {
      if (!(error instanceof EvidenceSourceUnavailable)) throw error;
      logger.warn({ query: state.currentQuery, err: error.message }, "video research failed, continuing without it");
      return;
    }
    logger.info({ query: state.currentQuery, results: response.results.length }, "video search");

    state.videoEvidence.push(deduplicateAndFormatSources(response, VIDEO_TOKENS_PER_SOURCE, true));
    state.citations.push(formatSources(response));
  }
}

import { z } from "zod";
import { MalformedModelOutput, errorMessage } from "./errors.js";
import type { LanguageModelClient } from "./llm.js";
import type { Logger } from "./logger.js";
import { queryWriterInstructions, reflectionInstructions, summarizerInstructions } from "./prompts.js";
import type { ResearchState } from "./state.js";

// ============================================================================
// Research steps: query generation, summarization, reflection, finalization
// ============================================================================

export interface StepDeps {
  llm: LanguageModelClient;
  logger: Logger;
}

const QueryResponseSchema = z.object({ query: z.string().trim().min(1) });

// follow_up_query is checked by hand; a missing or non-string value falls back
const ReflectionResponseSchema = z.object({
  knowledge_gap: z.unknown().optional(),
  follow_up_query: z.unknown().optional(),
});

export async function generateQuery(state: Pick<ResearchState, "topic">, { llm }: StepDeps): Promise<string> {
  const result = await llm.generateJson({
    system: queryWriterInstructions(state.topic),
    prompt: "Generate a query for web search:",
  });

  const parsed = QueryResponseSchema.safeParse(result);
  if (!parsed.success) {
    throw new MalformedModelOutput(`Query response lacks a "query" string: ${JSON.stringify(result)}`);
  }
  return parsed.data.query;
}

const THINK_OPEN = "<think>";
const THINK_CLOSE = "</think>";

/**
 * Removes every `<think>...</think>` span. An opening tag that is never closed
 * drops the rest of the text; a closing tag with no opening tag drops
 * everything before it. Text without markers is returned unchanged.
 */
export function stripThinkTags(text: string): string {
  let result = text;
  for (;;) {
    const start = result.indexOf(THINK_OPEN);
    if (start === -1) break;
    const end = result.indexOf(THINK_CLOSE, start + THINK_OPEN.length);
    if (end === -1) {
      result = result.slice(0, start);
      break;
    }
    result = result.slice(0, start) + result.slice(end + THINK_CLOSE.length);
  }

  const stray = result.lastIndexOf(THINK_CLOSE);
  return stray === -1 ? result : result.slice(stray + THINK_CLOSE.length);
}

export function buildSummaryPrompt(
  state: Pick<ResearchState, "topic" | "summary" | "webEvidence" | "videoEvidence">
): string {
  const latestWeb = state.webEvidence.length > 0 ? state.webEvidence[state.webEvidence.length - 1] : "";
  const video = state.videoEvidence.join("\n");
  const topic = `<User Input> \n ${state.topic} \n <User Input>\n\n`;
  const videoBlock = `<YouTube Search Results> \n ${video} \n <YouTube Search Results>`;

  if (state.summary) {
    return (
      topic +
      `<Existing Summary> \n ${state.summary} \n <Existing Summary>\n\n` +
      `<New Web Search Results> \n ${latestWeb} \n <New Web Search Results>\n\n` +
      videoBlock
    );
  }
  return topic + `<Web Search Results> \n ${latestWeb} \n <Web Search Results>\n\n` + videoBlock;
}

/** Folds the latest evidence into the running summary. Model failures propagate. */
export async function summarizeSources(
  state: Pick<ResearchState, "topic" | "summary" | "webEvidence" | "videoEvidence">,
  { llm }: StepDeps
): Promise<string> {
  const text = await llm.generateText({
    system: summarizerInstructions,
    prompt: buildSummaryPrompt(state),
  });
  return stripThinkTags(text);
}

export function fallbackQuery(topic: string): string {
  return `Tell me more about ${topic}`;
}

/**
 * Asks the model for a knowledge gap and a follow-up query. Never throws:
 * any failure yields the fallback query.
 */
export async function reflectOnSummary(
  state: Pick<ResearchState, "topic" | "summary">,
  { llm, logger }: StepDeps
): Promise<string> {
  let result: unknown;
  try {
    result = await llm.generateJson({
      system: reflectionInstructions(state.topic),
      prompt: `Identify a knowledge gap and generate a follow-up web search query based on our existing knowledge: ${state.summary}`,
    });
  } catch (error) {
    logger.warn({ err: errorMessage(error) }, "reflection failed, using fallback query");
    return fallbackQuery(state.topic);
  }

  const parsed = ReflectionResponseSchema.safeParse(result);
  const query = parsed.success ? parsed.data.follow_up_query : undefined;
  if (typeof query !== "string" || query.trim() === "") {
    logger.warn("reflection returned no follow-up query, using fallback query");
    return fallbackQuery(state.topic);
  }

  if (parsed.success && typeof parsed.data.knowledge_gap === "string") {
    logger.debug({ knowledgeGap: parsed.data.knowledge_gap }, "knowledge gap identified");
  }
  return query;
}

/** Presentation form: header, summary body, then every citation list in collection order. */
export function finalizeSummary(state: Pick<ResearchState, "summary" | "citations">): string {
  const allSources = state.citations.join("\n");
  return `## Summary\n\n${state.summary}\n\n### Sources:\n${allSources}`;
}

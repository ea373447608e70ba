import { YoutubeTranscript } from "youtube-transcript";
import { z } from "zod";
import { EvidenceSourceUnavailable, TranscriptTimeout, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { SearchResponse, SourceRecord } from "./sources.js";

// ============================================================================
// YouTube video search with transcripts
// ============================================================================

export const TRANSCRIPT_TIMED_OUT = "Transcript retrieval timed out.";
export const TRANSCRIPT_UNAVAILABLE = "Transcript not available.";

const SNIPPET_LENGTH = 200;

export interface TranscriptFetcher {
  fetchTranscript(videoId: string): Promise<string>;
}

export interface VideoSearchProvider {
  search(query: string): Promise<SearchResponse>;
}

/** Transcript fetcher backed by the public caption tracks. */
export const youtubeTranscriptFetcher: TranscriptFetcher = {
  async fetchTranscript(videoId) {
    const segments = await YoutubeTranscript.fetchTranscript(videoId);
    return segments.map((segment) => segment.text).join(" ");
  },
};

/**
 * Settles with `task` or rejects with TranscriptTimeout after `timeoutMs`,
 * whichever comes first. The task is abandoned, not awaited, on expiry.
 */
export function withTranscriptDeadline<T>(task: Promise<T>, videoId: string, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TranscriptTimeout(videoId, timeoutMs)), timeoutMs);
    timer.unref();
  });
  return Promise.race([task, deadline]).finally(() => clearTimeout(timer));
}

const YouTubeSearchSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.object({ videoId: z.string() }),
        snippet: z.object({ title: z.string() }),
      })
    )
    .default([]),
});

export interface YouTubeSearchOptions {
  apiKey: string;
  logger: Logger;
  maxResults?: number;
  transcriptTimeoutMs?: number;
  transcripts?: TranscriptFetcher;
}

export class YouTubeSearch implements VideoSearchProvider {
  private readonly apiKey: string;
  private readonly logger: Logger;
  private readonly maxResults: number;
  private readonly transcriptTimeoutMs: number;
  private readonly transcripts: TranscriptFetcher;

  constructor(options: YouTubeSearchOptions) {
    this.apiKey = options.apiKey;
    this.logger = options.logger;
    this.maxResults = options.maxResults ?? 3;
    this.transcriptTimeoutMs = options.transcriptTimeoutMs ?? 10_000;
    this.transcripts = options.transcripts ?? youtubeTranscriptFetcher;
  }

  async search(query: string): Promise<SearchResponse> {
    const url = new URL("https://www.googleapis.com/youtube/v3/search");
    url.searchParams.set("part", "snippet");
    url.searchParams.set("q", query);
    url.searchParams.set("type", "video");
    url.searchParams.set("maxResults", this.maxResults.toString());
    url.searchParams.set("key", this.apiKey);

    let response: Response;
    try {
      response = await fetch(url.toString(), { signal: AbortSignal.timeout(10_000) });
    } catch (error) {
      throw new EvidenceSourceUnavailable("youtube", `request failed: ${errorMessage(error)}`, { cause: error });
    }
    if (!response.ok) {
      throw new EvidenceSourceUnavailable("youtube", `HTTP ${response.status} ${response.statusText}`, {
        status: response.status,
      });
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new EvidenceSourceUnavailable("youtube", "response was not valid JSON", { cause: error });
    }
    const parsed = YouTubeSearchSchema.safeParse(data);
    if (!parsed.success) {
      throw new EvidenceSourceUnavailable("youtube", `unexpected response shape: ${parsed.error.message}`);
    }

    // Transcripts are fetched one video at a time, each under its own deadline
    const results: SourceRecord[] = [];
    for (const item of parsed.data.items.slice(0, this.maxResults)) {
      const videoId = item.id.videoId;
      const transcript = await this.transcriptFor(videoId);
      results.push({
        title: item.snippet.title,
        url: `https://www.youtube.com/watch?v=${videoId}`,
        content: transcript.length > SNIPPET_LENGTH ? transcript.slice(0, SNIPPET_LENGTH) + "..." : transcript,
        rawContent: transcript,
      });
    }
    return { results };
  }

  private async transcriptFor(videoId: string): Promise<string> {
    try {
      return await withTranscriptDeadline(
        this.transcripts.fetchTranscript(videoId),
        videoId,
        this.transcriptTimeoutMs
      );
    } catch (error) {
      if (error instanceof TranscriptTimeout) {
        this.logger.warn({ videoId, timeoutMs: error.timeoutMs }, "transcript fetch timed out");
        return TRANSCRIPT_TIMED_OUT;
      }
      this.logger.warn({ videoId, err: errorMessage(error) }, "transcript unavailable");
      return TRANSCRIPT_UNAVAILABLE;
    }
  }
}

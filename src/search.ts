import { z } from "zod";
import type { ResearchConfig, SearchProviderName } from "./config.js";
import { ConfigurationError, EvidenceSourceUnavailable, errorMessage } from "./errors.js";
import type { SearchResponse, SourceRecord } from "./sources.js";

// ============================================================================
// Web search providers
// ============================================================================

export interface SearchOptions {
  /** Zero-based research loop the search belongs to. */
  loopCount?: number;
}

export interface WebSearchProvider {
  readonly name: SearchProviderName;
  /** Whether evidence from this provider carries full page content. */
  readonly includeRawContent: boolean;
  search(query: string, options?: SearchOptions): Promise<SearchResponse>;
}

/**
 * POSTs a JSON body and validates the response against `schema`. Any network,
 * status or shape problem surfaces as EvidenceSourceUnavailable.
 */
export async function postJson<T extends z.ZodTypeAny>(
  provider: string,
  url: string,
  apiKey: string,
  body: unknown,
  schema: T
): Promise<z.infer<T>> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: {
        "Accept": "application/json",
        "Content-Type": "application/json",
        "Authorization": `Bearer ${apiKey}`,
      },
      body: JSON.stringify(body),
    });
  } catch (error) {
    throw new EvidenceSourceUnavailable(provider, `request failed: ${errorMessage(error)}`, { cause: error });
  }

  if (!response.ok) {
    throw new EvidenceSourceUnavailable(provider, `HTTP ${response.status} ${response.statusText}`, {
      status: response.status,
    });
  }

  let data: unknown;
  try {
    data = await response.json();
  } catch (error) {
    throw new EvidenceSourceUnavailable(provider, "response was not valid JSON", { cause: error });
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new EvidenceSourceUnavailable(provider, `unexpected response shape: ${parsed.error.message}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

// ----------------------------------------------------------------------------
// Tavily
// ----------------------------------------------------------------------------

const TavilyResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string(),
      url: z.string(),
      content: z.string().default(""),
      raw_content: z.string().nullish(),
    })
  ),
});

export class TavilySearch implements WebSearchProvider {
  readonly name = "tavily";
  readonly includeRawContent = true;

  constructor(
    private readonly apiKey: string,
    private readonly maxResults = 1
  ) {}

  async search(query: string): Promise<SearchResponse> {
    const data = await postJson(
      "tavily",
      "https://api.tavily.com/search",
      this.apiKey,
      { query, max_results: this.maxResults, include_raw_content: this.includeRawContent },
      TavilyResponseSchema
    );

    return {
      results: data.results.map((item) => ({
        title: item.title,
        url: item.url,
        content: item.content,
        rawContent: item.raw_content,
      })),
    };
  }
}

// ----------------------------------------------------------------------------
// Perplexity
// ----------------------------------------------------------------------------

const PerplexityResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .min(1),
  citations: z.array(z.string()).nullish(),
});

export const PERPLEXITY_FALLBACK_CITATION = "https://perplexity.ai";

/**
 * Perplexity answers with a single text plus a list of cited URLs. The text
 * becomes the first source; every further citation is listed as a reference
 * without repeating the content.
 */
export class PerplexitySearch implements WebSearchProvider {
  readonly name = "perplexity";
  readonly includeRawContent = false;

  constructor(
    private readonly apiKey: string,
    private readonly model = "sonar-pro"
  ) {}

  async search(query: string, options: SearchOptions = {}): Promise<SearchResponse> {
    const data = await postJson(
      "perplexity",
      "https://api.perplexity.ai/chat/completions",
      this.apiKey,
      {
        model: this.model,
        messages: [
          { role: "system", content: "Search the web and provide factual information with sources." },
          { role: "user", content: query },
        ],
      },
      PerplexityResponseSchema
    );

    const content = data.choices[0].message.content;
    const citations = data.citations?.length ? data.citations : [PERPLEXITY_FALLBACK_CITATION];
    const searchNumber = (options.loopCount ?? 0) + 1;

    const results: SourceRecord[] = citations.map((url, index) =>
      index === 0
        ? { title: `Perplexity Search ${searchNumber}, Source 1`, url, content, rawContent: content }
        : {
            title: `Perplexity Search ${searchNumber}, Source ${index + 1}`,
            url,
            content: "See above for full content",
            rawContent: null,
          }
    );

    return { results };
  }
}

// ============================================================================
// Provider selection
// ============================================================================

export function createWebSearchProvider(
  config: Pick<ResearchConfig, "searchProvider" | "tavilyApiKey" | "perplexityApiKey">
): WebSearchProvider {
  switch (config.searchProvider) {
    case "tavily":
      if (!config.tavilyApiKey) throw new ConfigurationError("TAVILY_API_KEY is required when SEARCH_API=tavily");
      return new TavilySearch(config.tavilyApiKey);
    case "perplexity":
      if (!config.perplexityApiKey) {
        throw new ConfigurationError("PERPLEXITY_API_KEY is required when SEARCH_API=perplexity");
      }
      return new PerplexitySearch(config.perplexityApiKey);
    default:
      throw new ConfigurationError(`Unsupported search API: ${String(config.searchProvider)}`);
  }
}

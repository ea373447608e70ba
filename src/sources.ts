// ============================================================================
// Source records, deduplication and formatting
// ============================================================================

export interface SourceRecord {
  title: string;
  url: string;
  /** Snippet or most relevant excerpt */
  content: string;
  rawContent?: string | null;
}

export interface SearchResponse {
  results: SourceRecord[];
}

export type SourceInput = SearchResponse | Array<SearchResponse | SourceRecord[]>;

export const TRUNCATION_MARKER = "... [truncated]";

// Rough estimate of 4 characters per token
export const CHARS_PER_TOKEN = 4;

export interface FormatOptions {
  /** Called for each source whose raw content was requested but absent. */
  onMissingRawContent?: (source: SourceRecord) => void;
}

function flattenSources(input: SourceInput): SourceRecord[] {
  if (!Array.isArray(input)) return input.results;

  const records: SourceRecord[] = [];
  for (const entry of input) {
    records.push(...(Array.isArray(entry) ? entry : entry.results));
  }
  return records;
}

/**
 * Merges the given responses in encounter order, keeps the first source seen
 * for every URL and renders each into a delimited text block. Raw content,
 * when requested, is cut to `maxTokensPerSource * 4` characters.
 */
export function deduplicateAndFormatSources(
  input: SourceInput,
  maxTokensPerSource: number,
  includeRawContent = false,
  options: FormatOptions = {}
): string {
  const unique = new Map<string, SourceRecord>();
  for (const source of flattenSources(input)) {
    if (!unique.has(source.url)) unique.set(source.url, source);
  }

  const charLimit = maxTokensPerSource * CHARS_PER_TOKEN;
  let formatted = "Sources:\n\n";

  for (const source of unique.values()) {
    formatted += `Source ${source.title}:\n===\n`;
    formatted += `URL: ${source.url}\n===\n`;
    formatted += `Most relevant content from source: ${source.content}\n===\n`;

    if (includeRawContent) {
      let raw = source.rawContent;
      if (raw === undefined || raw === null) {
        options.onMissingRawContent?.(source);
        raw = "";
      }
      if (raw.length > charLimit) {
        raw = raw.slice(0, charLimit) + TRUNCATION_MARKER;
      }
      formatted += `Full source content limited to ${maxTokensPerSource} tokens: ${raw}\n\n`;
    }
  }

  return formatted.trim();
}

/** One `* title : url` line per source, duplicates included. */
export function formatSources(response: SearchResponse): string {
  return response.results.map((source) => `* ${source.title} : ${source.url}`).join("\n");
}

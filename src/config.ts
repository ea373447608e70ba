import { z } from "zod";
import { ConfigurationError } from "./errors.js";

// ============================================================================
// Configuration
// ============================================================================

export const SEARCH_PROVIDERS = ["tavily", "perplexity"] as const;
export type SearchProviderName = (typeof SEARCH_PROVIDERS)[number];

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

// Empty variables in .env files count as unset
function env<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (typeof value === "string" && value.trim() === "" ? undefined : value), schema);
}

const EnvSchema = z.object({
  SEARCH_API: env(
    z.enum(SEARCH_PROVIDERS, {
      errorMap: () => ({ message: `must be one of: ${SEARCH_PROVIDERS.join(", ")}` }),
    }).default("tavily")
  ),
  MAX_WEB_RESEARCH_LOOPS: env(z.coerce.number().int().min(0).default(3)),
  LOCAL_LLM: env(z.string().default("llama3.2")),
  OLLAMA_BASE_URL: env(z.string().url().default("http://localhost:11434/")),
  TAVILY_API_KEY: env(z.string().optional()),
  PERPLEXITY_API_KEY: env(z.string().optional()),
  YOUTUBE_API_KEY: env(z.string().optional()),
  TRANSCRIPT_TIMEOUT_MS: env(z.coerce.number().int().positive().default(10_000)),
  EMAIL_RECIPIENT: env(z.string().email().optional()),
  SMTP_SERVER: env(z.string().default("smtp.gmail.com")),
  SMTP_PORT: env(z.coerce.number().int().min(1).max(65535).default(587)),
  SMTP_USERNAME: env(z.string().optional()),
  SMTP_PASSWORD: env(z.string().optional()),
  LOG_LEVEL: env(z.enum(LOG_LEVELS).default("info")),
});

export interface SmtpConfig {
  server: string;
  port: number;
  username?: string;
  password?: string;
}

export interface ResearchConfig {
  searchProvider: SearchProviderName;
  maxResearchLoops: number;
  modelName: string;
  ollamaBaseUrl: string;
  tavilyApiKey?: string;
  perplexityApiKey?: string;
  youtubeApiKey?: string;
  transcriptTimeoutMs: number;
  emailRecipient?: string;
  smtp: SmtpConfig;
  logLevel: (typeof LOG_LEVELS)[number];
}

/**
 * Reads and validates settings from the environment. Called once at startup;
 * the returned object is shared read-only by every run.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): ResearchConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration:\n- ${problems.join("\n- ")}`);
  }

  const vars = parsed.data;
  return {
    searchProvider: vars.SEARCH_API,
    maxResearchLoops: vars.MAX_WEB_RESEARCH_LOOPS,
    modelName: vars.LOCAL_LLM,
    ollamaBaseUrl: vars.OLLAMA_BASE_URL,
    tavilyApiKey: vars.TAVILY_API_KEY,
    perplexityApiKey: vars.PERPLEXITY_API_KEY,
    youtubeApiKey: vars.YOUTUBE_API_KEY,
    transcriptTimeoutMs: vars.TRANSCRIPT_TIMEOUT_MS,
    emailRecipient: vars.EMAIL_RECIPIENT,
    smtp: {
      server: vars.SMTP_SERVER,
      port: vars.SMTP_PORT,
      username: vars.SMTP_USERNAME,
      password: vars.SMTP_PASSWORD,
    },
    logLevel: vars.LOG_LEVEL,
  };
}

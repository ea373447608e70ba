// ============================================================================
// Error taxonomy
// ============================================================================

export class ResearchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid settings. */
export class ConfigurationError extends ResearchError {}

/** A structured model call did not return the JSON it was asked for. */
export class MalformedModelOutput extends ResearchError {}

export class EvidenceSourceUnavailable extends ResearchError {
  readonly provider: string;
  readonly status?: number;

  constructor(provider: string, message: string, options?: { cause?: unknown; status?: number }) {
    super(`${provider}: ${message}`, options);
    this.provider = provider;
    this.status = options?.status;
  }
}

export class TranscriptTimeout extends ResearchError {
  readonly videoId: string;
  readonly timeoutMs: number;

  constructor(videoId: string, timeoutMs: number) {
    super(`Transcript for ${videoId} not retrieved within ${timeoutMs}ms`);
    this.videoId = videoId;
    this.timeoutMs = timeoutMs;
  }
}

export class DeliveryFailed extends ResearchError {}

/** Raised by the runner when a fatal error aborts a run. */
export class ResearchRunError extends ResearchError {
  readonly stage: string;

  constructor(stage: string, cause: unknown) {
    super(`Research failed during ${stage}: ${errorMessage(cause)}`, { cause });
    this.stage = stage;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

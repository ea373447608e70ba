// ============================================================================
// Research state (one per run, never shared between runs)
// ============================================================================

export interface ResearchState {
  readonly topic: string;
  currentQuery: string;
  /** Completed web-research steps; the router compares this with the loop ceiling. */
  loopCount: number;
  readonly webEvidence: string[];
  readonly videoEvidence: string[];
  /** One bullet list per gathering call, in call order. */
  readonly citations: string[];
  summary: string;
  delivered: boolean;
}

export function createResearchState(topic: string): ResearchState {
  return {
    topic,
    currentQuery: "",
    loopCount: 0,
    webEvidence: [],
    videoEvidence: [],
    citations: [],
    summary: "",
    delivered: false,
  };
}

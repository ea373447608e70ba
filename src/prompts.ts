// ============================================================================
// Prompt templates
// ============================================================================

export function queryWriterInstructions(researchTopic: string): string {
  return `Your goal is to write a targeted web search query.

The query should gather information related to a specific topic.

<TOPIC>
${researchTopic}
</TOPIC>

<FORMAT>
Format your response as a JSON object with all three of these keys:
- "query": the actual search query string
- "aspect": the specific aspect of the topic being researched
- "rationale": a brief explanation of why this query is relevant
</FORMAT>

<EXAMPLE>
{
    "query": "machine learning transformer architecture explained",
    "aspect": "technical architecture",
    "rationale": "Understanding the fundamental structure of transformer models"
}
</EXAMPLE>

Provide your response in JSON format:`;
}

export const summarizerInstructions = `<GOAL>
Generate a high-quality summary of the web search results and video transcripts, keeping it relevant to the user's topic.
</GOAL>

<REQUIREMENTS>
When creating a NEW summary:
1. Highlight the most relevant information from each source
2. Provide a concise overview of the key points related to the topic
3. Emphasize significant findings or insights
4. Ensure a coherent flow of information

When EXTENDING an existing summary:
1. Read the existing summary and the new search results carefully
2. Compare the new information with the existing summary
3. For each piece of new information:
    a. If it relates to existing points, integrate it into the relevant paragraph
    b. If it is new but relevant, add a new paragraph with a smooth transition
    c. If it is not relevant to the topic, skip it
4. Ensure all additions stay relevant to the user's topic
5. Check that the final output differs from the input summary
</REQUIREMENTS>

<FORMATTING>
- Start directly with the updated summary, without preamble or titles. Do not use XML tags in the output.
</FORMATTING>`;

export function reflectionInstructions(researchTopic: string): string {
  return `You are an expert research assistant analyzing a summary about ${researchTopic}.

<GOAL>
1. Identify knowledge gaps or areas that need deeper exploration
2. Generate a follow-up question that would help expand your understanding
3. Focus on technical details, implementation specifics, or emerging trends that weren't fully covered
</GOAL>

<REQUIREMENTS>
Ensure the follow-up question is self-contained and includes the context needed for a web search.
</REQUIREMENTS>

<FORMAT>
Format your response as a JSON object with these exact keys:
- "knowledge_gap": describe what information is missing or needs clarification
- "follow_up_query": write a specific question to address this gap
</FORMAT>

<EXAMPLE>
{
    "knowledge_gap": "The summary lacks information about performance metrics and benchmarks",
    "follow_up_query": "What are typical performance benchmarks and metrics used to evaluate [specific technology]?"
}
</EXAMPLE>

Provide your analysis in JSON format:`;
}

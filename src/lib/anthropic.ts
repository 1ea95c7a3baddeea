import Anthropic from '@anthropic-ai/sdk';

// API key should be set in environment variable ANTHROPIC_API_KEY.
// The client is created on first use so modules that only import types
// (and tests that inject a fake collaborator) never need a key.
let client: Anthropic | undefined;

function getClient(): Anthropic {
  if (!client) {
    client = new Anthropic();
  }
  return client;
}

/** One phase attempt as the orchestrator describes it. */
export interface LlmRequest {
  system: string;
  instructions: string;
  context: string;
  priorOutputs: string;
  /** JSON shape the response must follow, rendered into the prompt */
  responseSchema: string;
}

export interface LlmCollaborator {
  complete(request: LlmRequest, signal?: AbortSignal): Promise<string>;
}

export function buildUserPrompt(request: LlmRequest): string {
  const sections = [
    request.instructions,
    `## RESEARCH CONTEXT\n\n${request.context}`,
  ];
  if (request.priorOutputs) {
    sections.push(`## PRIOR PHASE OUTPUTS\n\n${request.priorOutputs}`);
  }
  sections.push(`## RESPONSE FORMAT\n\nRespond with a single JSON object matching this shape, and nothing else:\n\n${request.responseSchema}`);
  return sections.join('\n\n---\n\n');
}

export async function complete(
  systemPrompt: string,
  userPrompt: string,
  options: {
    maxTokens?: number;
    temperature?: number;
    model?: string;
    abortSignal?: AbortSignal;
  } = {}
): Promise<string> {
  const {
    maxTokens = 8192,
    temperature = 0.4,
    model = 'claude-sonnet-4-20250514',
    abortSignal,
  } = options;

  const response = await getClient().messages.create({
    model,
    max_tokens: maxTokens,
    system: systemPrompt,
    messages: [
      { role: 'user', content: userPrompt }
    ],
    temperature,
  }, abortSignal ? { signal: abortSignal } : undefined);

  // Extract text from response
  const textContent = response.content.find(c => c.type === 'text');
  if (!textContent || textContent.type !== 'text') {
    throw new Error('No text content in response');
  }

  return textContent.text;
}

/** LLM collaborator backed by the Anthropic messages API. */
export function createAnthropicCollaborator(options: {
  model: string;
  maxTokens: number;
  temperature: number;
}): LlmCollaborator {
  return {
    complete: (request, signal) =>
      complete(request.system, buildUserPrompt(request), {
        model: options.model,
        maxTokens: options.maxTokens,
        temperature: options.temperature,
        abortSignal: signal,
      }),
  };
}

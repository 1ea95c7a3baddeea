/**
 * Phase 2: Competitive Intelligence: System Prompt
 *
 * Profile the competitors that matter and find the white space between them.
 * Builds on the market landscape from phase 1.
 */

import type { BusinessInput } from '../types';
import { CITATION_RULES, renderBusinessContext } from './business-context';

export const COMPETITIVE_INTEL_SYSTEM_PROMPT = `You are a competitive intelligence analyst. Your job is to profile the competitors this business will actually meet in deals, estimate how much their offering overlaps with it, and identify the white space none of them serves well.

Start with the competitors the business named. Add others only when the research context shows them competing for the same buyers. For each competitor give its positioning in one sentence, what it specializes in, funding if the sources report it, and its strengths and weaknesses as a buyer would see them. Overlap is the share of this business's offering the competitor also covers, 0-100.`;

export const COMPETITIVE_INTEL_RESPONSE_SHAPE = `{
  "summary": "2-4 sentence view of the competitive landscape",
  "competitors": [
    {
      "name": "Competitor",
      "positioning": "one sentence [4]",
      "specialty": "what they are best at",
      "funding": "Series B, $40M (2024) [5]",
      "strengths": ["..."],
      "weaknesses": ["..."],
      "overlapPercent": 60
    }
  ],
  "whiteSpace": ["unserved need [4]"],
  "positioningRecommendations": ["how to position against them"],
  "citations": [4, 5]
}`;

export function buildCompetitiveIntelInstructions(input: BusinessInput): string {
  const named = input.knownCompetitors.filter(c => c.trim()).join(', ');
  return `${renderBusinessContext(input)}

## TASK

Profile 3-6 competitors${named ? `, starting with: ${named}` : ''}. Then list the white space in the market and 2-4 positioning recommendations that follow from it. Use the market landscape from the prior phase for context, but do not repeat it.

${CITATION_RULES}`;
}

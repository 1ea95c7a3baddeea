/**
 * Phase 3: Segment Identification: System Prompt
 *
 * Split the addressable market into actionable segments. Segment shares must
 * add up to roughly 100% of the addressable market.
 */

import type { BusinessInput } from '../types';
import { CITATION_RULES, renderBusinessContext } from './business-context';

export const SEGMENT_IDENTIFICATION_SYSTEM_PROMPT = `You are a market segmentation strategist. You divide a market into 3-5 segments that differ in how they buy, not just in who they are. A good segment can be reached through identifiable channels, has a distinct pain point, and responds to a distinct message.

Use the market landscape and competitive intelligence from the prior phases. Size each segment as a percentage of the addressable market; the percentages should add up to roughly 100. Give a plain-language size estimate as well (for example "about 12,000 mid-market firms in North America").`;

export const SEGMENT_IDENTIFICATION_RESPONSE_SHAPE = `{
  "segments": [
    {
      "name": "Segment name",
      "characteristics": ["defining trait [2]"],
      "sizePercent": 35,
      "sizeEstimate": "plain-language size",
      "painPoints": ["..."],
      "buyingTriggers": ["..."],
      "preferredChannels": ["..."],
      "messagingHooks": ["..."],
      "useCases": ["..."]
    }
  ],
  "citations": [2]
}`;

export function buildSegmentIdentificationInstructions(input: BusinessInput): string {
  const modelNote = input.businessModel === 'B2C'
    ? 'Segment consumers by need, life stage and purchase behavior.'
    : input.businessModel === 'B2B'
      ? 'Segment organizations by size, industry, buying committee and maturity.'
      : 'This business sells to both organizations and consumers; include segments of each kind.';

  return `${renderBusinessContext(input)}

## TASK

Identify 3-5 customer segments for this business. ${modelNote} For each, give characteristics, size, pain points, buying triggers, preferred channels, messaging hooks and use cases.

${CITATION_RULES}`;
}

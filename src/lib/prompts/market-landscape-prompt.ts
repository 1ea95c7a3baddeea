/**
 * Phase 1: Market Landscape: System Prompt
 *
 * Size the market and describe where it is heading. Figures must come from the
 * research context; the model is told to prefer null over invention.
 */

import type { BusinessInput } from '../types';
import { CITATION_RULES, renderBusinessContext } from './business-context';

export const MARKET_LANDSCAPE_SYSTEM_PROMPT = `You are a senior market analyst preparing the market landscape section of a segmentation study. You work only from the research context you are given. You report figures the sources support, with the source cited, and you say plainly when the sources do not support a figure.

Market size is reported in USD millions as a total addressable market for the business described. Growth is a compound annual growth rate in percent. When sources disagree, prefer the most recent tier 1 or tier 2 source and mention the disagreement in your summary. If no source supports a figure, return null for it rather than estimating.`;

export const MARKET_LANDSCAPE_RESPONSE_SHAPE = `{
  "summary": "2-4 sentence overview of the market",
  "marketSizeUsdMillions": 12500,
  "marketSizeYear": 2025,
  "growthRatePercent": 14.2,
  "keyInsights": ["insight with citation [1]"],
  "trends": ["trend [2]"],
  "growthFactors": ["driver [3]"],
  "urgencies": ["why buyers act now [1]"],
  "citations": [1, 2, 3]
}`;

export function buildMarketLandscapeInstructions(input: BusinessInput): string {
  return `${renderBusinessContext(input)}

## TASK

Describe the market this business competes in:
- Total addressable market (USD millions) and the year the figure refers to
- Compound annual growth rate (percent)
- 3-6 key insights a go-to-market team should know
- Current trends, growth factors, and the urgencies that make buyers act now

${CITATION_RULES}`;
}

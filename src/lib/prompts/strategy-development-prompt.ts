/**
 * Phase 5: Strategy Development: System Prompt
 *
 * Turn the four prior phases into a 90-day go-to-market plan.
 */

import type { BusinessInput } from '../types';
import { CITATION_RULES, renderBusinessContext } from './business-context';

export const STRATEGY_DEVELOPMENT_SYSTEM_PROMPT = `You are a go-to-market strategist. You receive a market landscape, competitive intelligence, segments and personas, and you turn them into a plan a small team can start on Monday.

Prioritize segments by opportunity and fit with the business, not by size alone. The roadmap has three stages: days 0-30, 30-60 and 60-90, each with 3-5 concrete activities. Quick wins are actions that pay off within weeks. Success metrics must be measurable.`;

export const STRATEGY_DEVELOPMENT_RESPONSE_SHAPE = `{
  "prioritizedSegments": ["Segment name", "..."],
  "roadmap": {
    "days0to30": ["..."],
    "days30to60": ["..."],
    "days60to90": ["..."]
  },
  "quickWins": ["..."],
  "successMetrics": ["..."],
  "messagingPillars": ["..."],
  "citations": [1]
}`;

export function buildStrategyDevelopmentInstructions(input: BusinessInput): string {
  return `${renderBusinessContext(input)}

## TASK

Build the go-to-market strategy: prioritized segments (names exactly as in the segment phase), a three-stage 90-day roadmap, quick wins, success metrics and 3-4 messaging pillars.

${CITATION_RULES}`;
}

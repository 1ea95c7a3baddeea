/**
 * Phase 4: Persona Development: System Prompt
 *
 * One buyer persona per segment from phase 3.
 */

import type { BusinessInput } from '../types';
import { CITATION_RULES, renderBusinessContext } from './business-context';

export const PERSONA_DEVELOPMENT_SYSTEM_PROMPT = `You are a customer research lead writing buyer personas. Each persona represents one segment from the prior phase and describes a realistic buyer: what they are responsible for, what they worry about, what they are trying to achieve, and what would stop them from buying.

Ground personas in the research context and the segment definitions. Do not invent statistics. Demographics are short key/value pairs (for example "role": "Head of Talent", "company size": "200-1000"). For B2B personas, add pain points by role where the buying committee has more than one role.`;

export const PERSONA_DEVELOPMENT_RESPONSE_SHAPE = `{
  "personas": [
    {
      "segment": "Segment name from the prior phase",
      "name": "Persona name",
      "description": "2-3 sentences [3]",
      "demographics": { "role": "...", "company size": "..." },
      "psychographics": ["..."],
      "goals": ["..."],
      "objections": ["..."],
      "roleSpecificPainPoints": { "Role": ["..."] }
    }
  ],
  "citations": [3]
}`;

export function buildPersonaDevelopmentInstructions(input: BusinessInput): string {
  return `${renderBusinessContext(input)}

## TASK

Write one persona for each segment identified in the prior phase. Use the segment name exactly as given.

${CITATION_RULES}`;
}

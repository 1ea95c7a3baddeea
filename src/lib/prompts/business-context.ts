/**
 * Business context block shared by every phase prompt.
 * Renders the questionnaire answers, including the B2B/B2C detail, as markdown.
 */

import type { BusinessInput } from '../types';

function list(items: string[] | undefined): string {
  const clean = (items ?? []).map(i => i.trim()).filter(Boolean);
  return clean.length > 0 ? clean.join(', ') : 'not specified';
}

export function renderBusinessContext(input: BusinessInput): string {
  const lines = [
    '## BUSINESS',
    '',
    `- Company: ${input.companyName?.trim() || 'not specified'}`,
    `- Industry: ${input.industry.trim() || 'not specified'}`,
    `- Business model: ${input.businessModel}`,
    `- Geography: ${list(input.geography)}`,
    `- Known competitors: ${list(input.knownCompetitors)}`,
  ];

  if (input.description?.trim()) {
    lines.push(`- Description: ${input.description.trim()}`);
  }
  if (input.targetDescription?.trim()) {
    lines.push(`- Target customers: ${input.targetDescription.trim()}`);
  }

  if (input.b2b) {
    lines.push(
      '',
      '### B2B detail',
      `- Target company sizes: ${list(input.b2b.targetCompanySizes)}`,
      `- Target industries: ${list(input.b2b.targetIndustries)}`,
      `- Deal size: ${input.b2b.dealSizeRange || 'not specified'}`,
      `- Sales cycle: ${input.b2b.salesCycleLength || 'not specified'}`,
      `- Decision-maker roles: ${list(input.b2b.decisionMakerRoles)}`,
      `- Known pain points: ${list(input.b2b.painPoints)}`,
    );
  }

  if (input.b2c) {
    lines.push(
      '',
      '### B2C detail',
      `- Target age groups: ${list(input.b2c.targetAgeGroups)}`,
      `- Income brackets: ${list(input.b2c.incomeBrackets)}`,
      `- Product category: ${input.b2c.productCategory || 'not specified'}`,
      `- Purchase frequency: ${input.b2c.purchaseFrequency || 'not specified'}`,
      `- Customer motivations: ${list(input.b2c.customerMotivations)}`,
    );
  }

  return lines.join('\n');
}

/** Citation rules appended to every phase's instructions. */
export const CITATION_RULES = `## CITATIONS

The research context is a numbered list of sources. Cite them inline as [n] and list every id you relied on in the "citations" array. Only cite ids that appear in the research context. If the context is marked INSUFFICIENT DATA, say so in your summary, keep estimates conservative, and return an empty "citations" array.`;

/**
 * Reformat instruction for a phase response that failed validation.
 * Appended to the original instructions on each retry; the validation errors
 * are quoted back so the model can fix exactly what was wrong.
 */

const MAX_ISSUES = 8;

export function buildReformatInstruction(issues: string[], attempt: number, maxAttempts: number): string {
  const listed = issues.slice(0, MAX_ISSUES).map(i => `- ${i}`).join('\n');
  const strictness = attempt >= maxAttempts
    ? 'This is the final attempt. Output ONLY the JSON object: no prose, no markdown fences, no comments.'
    : 'Output only the JSON object, with no text before or after it.';

  return `## YOUR PREVIOUS RESPONSE WAS REJECTED

It did not match the required format:
${listed || '- response was not valid JSON'}

${strictness} Every required field must be present with the type shown in the response format.`;
}

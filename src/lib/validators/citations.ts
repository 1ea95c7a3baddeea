// Citation Validator
// Phase outputs may only cite sources that exist in the run's bibliography.

const INLINE_CITATION = /\[(\d{1,4})\]/g;

/** Ids cited inline as [n] anywhere in the raw model output. */
export function extractInlineCitations(raw: string): number[] {
  const ids = new Set<number>();
  for (const match of raw.matchAll(INLINE_CITATION)) {
    ids.add(Number(match[1]));
  }
  return Array.from(ids);
}

export interface CitationCheck {
  valid: number[];
  unknown: number[];
}

export function checkCitations(cited: number[], bibliography: Record<number, string>): CitationCheck {
  const known = new Set(Object.keys(bibliography).map(Number));
  const distinct = Array.from(new Set(cited)).sort((a, b) => a - b);
  return {
    valid: distinct.filter(id => known.has(id)),
    unknown: distinct.filter(id => !known.has(id)),
  };
}

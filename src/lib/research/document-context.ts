// Uploaded-document context
//
// Text the caller has already extracted from uploaded files enters the pipeline
// as a single pseudo-source. It is scored like any other draft; its pseudo-domain
// pins it to tier 2.

import stopwordsJson from './data/stopwords.json';
import { z } from 'zod';
import { sanitizeForPrompt } from '../sanitize';
import type { DocumentContext, SourceDraft } from '../types';
import { DOCUMENT_DOMAIN } from './tiering';

const STOPWORDS = new Set(z.array(z.string()).parse(stopwordsJson));

export const DOCUMENT_URL = 'document://uploaded';

export function documentToDraft(doc: DocumentContext): SourceDraft | null {
  const text = sanitizeForPrompt(doc.text);
  if (!text) return null;

  const names = doc.fileNames.filter(n => n.trim());
  const title = names.length > 0 ? `Uploaded documents: ${names.join(', ')}` : 'Uploaded documents';

  return {
    url: DOCUMENT_URL,
    normalizedUrl: DOCUMENT_URL,
    title,
    rawText: text,
    snippet: text.slice(0, 300),
    domain: DOCUMENT_DOMAIN,
    organization: 'Uploaded documents',
    categories: ['research'],
    contentOrigin: 'document',
  };
}

/**
 * Most frequent significant words in the documents (ties broken alphabetically),
 * used to extend the planner's relevance terms.
 */
export function documentTerms(doc: DocumentContext, limit = 8): string[] {
  const counts = new Map<string, number>();
  for (const word of doc.text.toLowerCase().split(/[^a-z0-9-]+/)) {
    if (word.length < 5 || STOPWORDS.has(word) || /^\d+$/.test(word)) continue;
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }

  return Array.from(counts.entries())
    .filter(([, n]) => n >= 2)
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, limit)
    .map(([word]) => word);
}

// APA-style bibliography entries for cited sources

import type { SourceRecord } from '../types';

export function publishedYear(record: Pick<SourceRecord, 'publishedDate'>): number | undefined {
  if (!record.publishedDate) return undefined;
  const date = new Date(record.publishedDate);
  return Number.isNaN(date.getTime()) ? undefined : date.getUTCFullYear();
}

/** `Organization. (Year). Title. Retrieved from URL`, with `n.d.` when undated. */
export function formatCitation(record: SourceRecord): string {
  const organization = (record.organization || record.domain).trim();
  const year = publishedYear(record) ?? 'n.d.';
  const title = record.title.replace(/\s+/g, ' ').trim().replace(/\.+$/, '');

  if (record.contentOrigin === 'document') {
    return `${organization}. (${year}). ${title}. User-provided material.`;
  }
  return `${organization}. (${year}). ${title}. Retrieved from ${record.url}`;
}

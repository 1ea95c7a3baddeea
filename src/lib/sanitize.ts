// Utility functions for sanitizing web content before it is embedded in prompts.
// Extracted pages often carry image markup, consent banners and newsletter chrome
// that waste context budget and confuse the model.

/**
 * Strips image references from text content.
 *
 * Removes:
 * - Markdown images: ![alt text](url)
 * - HTML img, picture, source and svg elements
 * - Base64 data URLs
 */
export function stripImages(content: string): string {
  if (!content) return content;

  let result = content;

  result = result.replace(/!\[[^\]]*\]\([^)]+\)/g, '');
  result = result.replace(/!\[[^\]]*\]\[[^\]]*\]/g, '');
  result = result.replace(/<img[^>]*\/?>/gi, '');
  result = result.replace(/<picture[^>]*>[\s\S]*?<\/picture>/gi, '');
  result = result.replace(/<figure[^>]*>[\s\S]*?<img[\s\S]*?<\/figure>/gi, '');
  result = result.replace(/<source[^>]*\/?>/gi, '');
  result = result.replace(/data:image\/[a-zA-Z]+;base64,[a-zA-Z0-9+/=]+/g, '[image data removed]');
  result = result.replace(/<svg[^>]*>[\s\S]*?<\/svg>/gi, '');

  result = result.replace(/\n{3,}/g, '\n\n');

  return result;
}

/**
 * Strips page chrome that survives text extraction: cookie/consent notices,
 * newsletter prompts, share bars and paywall teasers.
 */
export function stripBoilerplate(content: string): string {
  let result = content;

  // Consent banners are usually one paragraph
  result = result.replace(/^.*\b(?:we use cookies|cookie (?:policy|settings|preferences)|accept all cookies)\b.*$/gim, '');

  // Newsletter and sign-up prompts
  result = result.replace(/^.*\b(?:subscribe to our newsletter|sign up for our newsletter|get the latest news delivered)\b.*$/gim, '');

  // Share bars
  result = result.replace(/^(?:share(?: this)?(?: article)?\s*[:|]?\s*)?(?:(?:facebook|twitter|linkedin|email|x)\s*[|,]?\s*){2,}$/gim, '');

  // Paywall teasers and everything after
  result = result.replace(/(?:To continue reading|Subscribe to continue reading|This content is for subscribers only)[\s\S]*/i, '');

  result = result.replace(/[ \t]+\n/g, '\n');
  result = result.replace(/\n{3,}/g, '\n\n');

  return result.trim();
}

/**
 * Sanitizes content for use in LLM prompts.
 * This is the main function to call before embedding web content in prompts.
 */
export function sanitizeForPrompt(content: string): string {
  return stripBoilerplate(stripImages(content));
}

/**
 * Cut text to at most maxChars, preferring a sentence end, then a word boundary,
 * within the last 20% of the allowance.
 */
export function truncateAtBoundary(text: string, maxChars: number): string {
  if (maxChars <= 0) return '';
  if (text.length <= maxChars) return text;

  const slice = text.slice(0, maxChars);
  const floor = Math.floor(maxChars * 0.8);

  const sentenceEnd = Math.max(slice.lastIndexOf('. '), slice.lastIndexOf('.\n'));
  if (sentenceEnd >= floor) return slice.slice(0, sentenceEnd + 1);

  const space = slice.lastIndexOf(' ');
  if (space >= floor) return slice.slice(0, space);

  return slice;
}

const BOLD = /\*\*([^*]+)\*\*/g;
const INLINE_CODE = /`([^`]+)`/g;
const ITALIC = /\*([^*]+)\*/g;

/**
 * Drop bold, inline-code and italic markers (keeping their content) and
 * collapse every whitespace run, newlines included, to a single space.
 */
export function normalizeMarkdown(text: string): string {
  return text
    .replace(BOLD, '$1')
    .replace(INLINE_CODE, '$1')
    .replace(ITALIC, '$1')
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .join(' ');
}

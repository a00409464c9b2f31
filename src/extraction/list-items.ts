export type ListStyle = 'numbered' | 'bulleted';

// An item runs until the next marker of its own list, a blank line or the
// end of the text. `(?![\s\S])` is end-of-input regardless of the m flag.
const LIST_PATTERNS: Record<ListStyle, RegExp> = {
  numbered: /^\s*\d+[.)]\s+([\s\S]+?)(?=\n\s*\d+[.)]|\n\n|(?![\s\S]))/gm,
  bulleted: /^\s*[-*]\s+([\s\S]+?)(?=\n\s*[-*]|\n\n|(?![\s\S]))/gm,
};

// Styles in the order they are tried; see parseLearningItems.
export const LIST_STYLE_ORDER: readonly ListStyle[] = ['numbered', 'bulleted'];

/**
 * Raw, unnormalized bodies of every item of the given list style, in
 * document order.
 */
export function extractListItems(text: string, style: ListStyle): string[] {
  const pattern = new RegExp(LIST_PATTERNS[style]);
  return Array.from(text.matchAll(pattern), (match) => match[1]);
}

/**
 * Learnings extraction: transcript text → section → list items → clean items
 */

import type { Logger } from '../core/index.js';
import { normalizeMarkdown } from './markdown.js';
import { LIST_STYLE_ORDER, extractListItems } from './list-items.js';
import { locateLearnings } from './sections.js';
import { reconstructTranscriptText } from './transcript.js';

export const DEFAULT_MIN_LEARNING_LENGTH = 20;

export interface ExtractOptions {
  minLength?: number;
}

export function isValidLearning(cleaned: string, minLength: number = DEFAULT_MIN_LEARNING_LENGTH): boolean {
  // Leading '[' marks unfilled template slots such as "[learning here]".
  return Array.from(cleaned).length >= minLength && !cleaned.startsWith('[');
}

/**
 * Clean items of one section. Numbered items are tried first; bulleted items
 * only when no numbered item survives validation.
 */
export function parseLearningItems(
  sectionBody: string,
  minLength: number = DEFAULT_MIN_LEARNING_LENGTH,
): string[] {
  for (const style of LIST_STYLE_ORDER) {
    const learnings = extractListItems(sectionBody, style)
      .map(normalizeMarkdown)
      .filter((item) => isValidLearning(item, minLength));
    if (learnings.length > 0) return learnings;
  }
  return [];
}

export function extractLearningsFromText(text: string, options: ExtractOptions = {}): string[] {
  const minLength = options.minLength ?? DEFAULT_MIN_LEARNING_LENGTH;
  const located = locateLearnings(text, (body) => parseLearningItems(body, minLength));
  return located ? located.items : [];
}

export async function extractLearnings(
  agentTranscriptPath: string,
  logger: Logger,
  options: ExtractOptions = {},
): Promise<string[]> {
  const text = await reconstructTranscriptText(agentTranscriptPath, logger);
  if (!text.trim()) {
    logger.info('Agent transcript is empty. Nothing to capture.');
    return [];
  }

  const learnings = extractLearningsFromText(text, options);
  if (learnings.length === 0) {
    logger.info('No learning section found in transcript.');
    return [];
  }
  logger.info(`Found learnings block. Extracted ${learnings.length} item(s).`);
  return learnings;
}

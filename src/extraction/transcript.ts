/**
 * Rebuilding readable text from a sub-agent's JSONL transcript
 */

import { isJsonObject, readJsonLines, readString, type JsonObject, type Logger } from '../core/index.js';

type TextRule = (record: JsonObject) => string[];

// Tool output is stored with escaped newlines.
export function unescapeNewlines(text: string): string {
  return text.split('\\n').join('\n');
}

function messageContent(record: JsonObject): unknown[] {
  const message = record.message;
  if (!isJsonObject(message)) return [];
  return Array.isArray(message.content) ? message.content : [];
}

function textBlocks(blocks: unknown[]): string[] {
  const texts: string[] = [];
  for (const block of blocks) {
    if (!isJsonObject(block) || block.type !== 'text') continue;
    const text = readString(block, 'text');
    if (text) texts.push(text);
  }
  return texts;
}

const assistantText: TextRule = (record) =>
  record.type === 'assistant' ? textBlocks(messageContent(record)) : [];

// Only list-shaped tool results come from sub-tasks; plain string results
// (shell, file reads) are skipped.
const subTaskResultText: TextRule = (record) => {
  if (record.type !== 'user') return [];
  const texts: string[] = [];
  for (const item of messageContent(record)) {
    if (!isJsonObject(item) || item.type !== 'tool_result') continue;
    if (!Array.isArray(item.content)) continue;
    texts.push(...textBlocks(item.content).map(unescapeNewlines));
  }
  return texts;
};

const legacyToolResultText: TextRule = (record) => {
  if (record.type !== 'tool_result') return [];
  const content = readString(record, 'content');
  return content ? [unescapeNewlines(content)] : [];
};

const TEXT_RULES: readonly TextRule[] = [assistantText, subTaskResultText, legacyToolResultText];

export function collectTranscriptFragments(records: JsonObject[]): string[] {
  const fragments: string[] = [];
  for (const record of records) {
    for (const rule of TEXT_RULES) {
      fragments.push(...rule(record));
    }
  }
  return fragments;
}

/**
 * Newline-joined text of every readable fragment, in file order. Read
 * failures are logged and give ''.
 */
export async function reconstructTranscriptText(
  transcriptPath: string,
  logger: Logger,
): Promise<string> {
  if (!transcriptPath) return '';
  try {
    const records = await readJsonLines(transcriptPath);
    return collectTranscriptFragments(records).join('\n');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`Error extracting text from transcript: ${reason}`);
    return '';
  }
}

/**
 * Reading the hook envelope from stdin
 */

import * as path from 'path';
import { isJsonObject, readString, type HookInput, type Logger } from '../core/index.js';

export const EMPTY_HOOK_INPUT: Readonly<HookInput> = Object.freeze({
  session_id: '',
  agent_transcript_path: '',
  transcript_path: '',
  cwd: '',
});

export async function readStdin(stream: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin): Promise<string> {
  if (stream.isTTY) return '';
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export function parseHookInput(raw: string, logger: Logger): HookInput {
  if (!raw.trim()) return { ...EMPTY_HOOK_INPUT };

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`Invalid JSON from stdin: ${reason}`);
    return { ...EMPTY_HOOK_INPUT };
  }

  if (!isJsonObject(parsed)) {
    logger.warn('Hook input is not a JSON object; ignoring it.');
    return { ...EMPTY_HOOK_INPUT };
  }

  return {
    session_id: readString(parsed, 'session_id'),
    agent_transcript_path: readString(parsed, 'agent_transcript_path'),
    transcript_path: readString(parsed, 'transcript_path'),
    cwd: readString(parsed, 'cwd'),
  };
}

export function projectFromCwd(cwd: string): string {
  if (!cwd) return 'unknown';
  return path.basename(cwd) || 'unknown';
}

/**
 * Detecting which sub-agent ran most recently from the parent transcript
 */

import {
  UNKNOWN_AGENT,
  fileExists,
  isJsonObject,
  readJsonLines,
  readString,
  type JsonObject,
  type Logger,
} from '../core/index.js';

export type AgentIdentityRule = (record: JsonObject) => string[];

function subagentType(input: unknown): string | null {
  if (!isJsonObject(input)) return null;
  return readString(input, 'subagent_type') || null;
}

// { message: { content: [{ type: 'tool_use', name: 'Task', input: { subagent_type } }] } }
// Some records carry `content` at the top level instead of under `message`.
export const taskToolUseRule: AgentIdentityRule = (record) => {
  const holder = isJsonObject(record.message) ? record.message : record;
  const content = holder.content;
  if (!Array.isArray(content)) return [];
  const found: string[] = [];
  for (const item of content) {
    if (!isJsonObject(item) || item.type !== 'tool_use' || item.name !== 'Task') continue;
    const name = subagentType(item.input);
    if (name) found.push(name);
  }
  return found;
};

// Pre-execution records: { tool_input: { subagent_type } }
export const preToolUseRule: AgentIdentityRule = (record) => {
  const name = subagentType(record.tool_input);
  return name ? [name] : [];
};

export const AGENT_IDENTITY_RULES: readonly AgentIdentityRule[] = [taskToolUseRule, preToolUseRule];

export function collectAgentDispatches(
  records: JsonObject[],
  rules: readonly AgentIdentityRule[] = AGENT_IDENTITY_RULES,
): string[] {
  const found: string[] = [];
  for (const record of records) {
    for (const rule of rules) {
      found.push(...rule(record));
    }
  }
  return found;
}

/**
 * The last sub-agent dispatched in the parent transcript, or `unknown`.
 * Nested dispatches are expected; the newest one is the agent whose
 * completion triggered this run.
 */
export async function detectAgentName(parentTranscriptPath: string, logger: Logger): Promise<string> {
  if (!parentTranscriptPath) {
    logger.warn('No parent transcript path provided.');
    return UNKNOWN_AGENT;
  }
  if (!(await fileExists(parentTranscriptPath))) {
    logger.warn(`Parent transcript not found: ${parentTranscriptPath}`);
    return UNKNOWN_AGENT;
  }

  let found: string[] = [];
  try {
    found = collectAgentDispatches(await readJsonLines(parentTranscriptPath));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`Error reading parent transcript: ${reason}`);
    return UNKNOWN_AGENT;
  }

  const agentName = found.at(-1);
  if (!agentName) {
    logger.warn('Could not detect subagent_type from parent transcript.');
    return UNKNOWN_AGENT;
  }
  logger.info(`Detected agent_name: ${agentName} (from ${found.length} task(s))`);
  return agentName;
}

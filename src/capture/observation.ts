import type { ObservationRecord } from '../core/index.js';

export const DEFAULT_TITLE_LENGTH = 60;

export interface ObservationInput {
  learning: string;
  agentName: string;
  project: string;
  sessionId: string;
  type: string;
  source: string;
  now?: Date;
  titleLength?: number;
}

// Cut on code points so surrogate pairs stay whole.
export function headChars(text: string, length: number): string {
  return Array.from(text).slice(0, length).join('');
}

/** `[agent] <first 60 characters>...`; the ellipsis is always appended. */
export function buildTitle(agentName: string, learning: string, length: number = DEFAULT_TITLE_LENGTH): string {
  return `[${agentName}] ${headChars(learning, length)}...`;
}

export function buildObservation(input: ObservationInput): ObservationRecord {
  const capturedAt = (input.now ?? new Date()).toISOString();
  return Object.freeze({
    title: buildTitle(input.agentName, input.learning, input.titleLength),
    content: input.learning,
    type: input.type,
    project: input.project,
    metadata: Object.freeze({
      session_id: input.sessionId,
      agent_name: input.agentName,
      source: input.source,
      captured_at: capturedAt,
    }),
  });
}

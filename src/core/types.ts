/**
 * Shared TypeScript types for learnings-capture
 */

// ============================================================================
// JSON helpers
// ============================================================================

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(source: JsonObject, key: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : '';
}

// ============================================================================
// Hook envelope
// ============================================================================

/**
 * Payload the host writes to stdin when a sub-agent finishes.
 * Every field falls back to '' when absent or malformed.
 */
export interface HookInput {
  session_id: string;
  agent_transcript_path: string;
  transcript_path: string;
  cwd: string;
}

// ============================================================================
// Capture service payloads
// ============================================================================

export interface ObservationMetadata {
  session_id: string;
  agent_name: string;
  source: string;
  captured_at: string;
}

export interface ObservationRecord {
  title: string;
  content: string;
  type: string;
  project: string;
  metadata: ObservationMetadata;
}

export type CaptureStatus =
  | 'service-unavailable'
  | 'missing-transcript'
  | 'no-learnings'
  | 'completed';

export interface CaptureOutcome {
  status: CaptureStatus;
  sessionId: string;
  project: string;
  agentName: string;
  learnings: string[];
  saved: number;
  failed: number;
}

export type SessionStopStatus =
  | 'service-unavailable'
  | 'missing-session'
  | 'session-unavailable'
  | 'summarized'
  | 'unsummarized';

export interface SessionStopOutcome {
  status: SessionStopStatus;
  sessionId: string;
  project: string;
  /** Observations recorded for the session; null when never asked. */
  observations: number | null;
}

export const UNKNOWN_AGENT = 'unknown';

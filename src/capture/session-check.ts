/**
 * End-of-session check: did the session leave a summary behind?
 *
 * Passive like the sub-agent capture: it only reads from the service and
 * writes to its own log.
 */

import type { HookInput, JsonObject, Logger, SessionStopOutcome } from '../core/index.js';
import type { CaptureClient } from './client.js';
import { projectFromCwd } from './hook-input.js';

export interface SessionCheckDeps {
  client: Pick<CaptureClient, 'checkHealth' | 'getSession' | 'countObservations'>;
  logger: Logger;
}

const NO_SUMMARY = new Set(['0', 'false', 'null']);

/**
 * `has_summary` wins when set; otherwise `summary_count`. A missing, false,
 * null or zero value means no summary was saved.
 */
export function hasSessionSummary(session: JsonObject): boolean {
  const marker = [session.has_summary, session.summary_count].find(
    (value) => value !== undefined && value !== null && value !== false,
  );
  if (marker === undefined) return false;
  return !NO_SUMMARY.has(String(marker));
}

export async function runSessionStopCheck(input: HookInput, deps: SessionCheckDeps): Promise<SessionStopOutcome> {
  const { client, logger } = deps;
  const outcome: SessionStopOutcome = {
    status: 'summarized',
    sessionId: input.session_id,
    project: projectFromCwd(input.cwd),
    observations: null,
  };

  logger.info(`Session stopping. session=${outcome.sessionId} project=${outcome.project}`);

  if (!(await client.checkHealth())) {
    logger.warn('Capture service not running. Cannot check session summary.');
    return { ...outcome, status: 'service-unavailable' };
  }

  if (!outcome.sessionId) {
    logger.warn('No session id in hook input. Cannot check session summary.');
    return { ...outcome, status: 'missing-session' };
  }

  const session = await client.getSession(outcome.sessionId);
  if (!session) {
    logger.warn(`Could not fetch session data for session=${outcome.sessionId}`);
    return { ...outcome, status: 'session-unavailable' };
  }

  if (hasSessionSummary(session)) {
    logger.info(`Session ${outcome.sessionId} closed cleanly with summary. Project: ${outcome.project}`);
  } else {
    outcome.status = 'unsummarized';
    logger.warn(`Session ${outcome.sessionId} ended without a session summary. Project: ${outcome.project}`);
    logger.warn("This session's context may not be recoverable in future sessions.");
  }

  outcome.observations = await client.countObservations(outcome.sessionId);
  logger.info(`Session ${outcome.sessionId} metrics: observations=${outcome.observations}`);
  return outcome;
}

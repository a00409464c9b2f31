/**
 * Passive capture of sub-agent learnings.
 *
 * One run, strictly in order, stopping at the first unmet precondition:
 * service health → agent transcript present → agent identity → learnings →
 * one submission per learning.
 */

import { UNKNOWN_AGENT, fileExists, type CaptureConfig, type CaptureOutcome, type HookInput, type Logger } from '../core/index.js';
import { detectAgentName, extractLearnings } from '../extraction/index.js';
import type { CaptureClient } from './client.js';
import { buildObservation, headChars } from './observation.js';
import { projectFromCwd } from './hook-input.js';

export interface CaptureDeps {
  client: Pick<CaptureClient, 'checkHealth' | 'saveObservation'>;
  config: CaptureConfig;
  logger: Logger;
  now?: () => Date;
}

export async function runSubagentCapture(input: HookInput, deps: CaptureDeps): Promise<CaptureOutcome> {
  const { client, config, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const outcome: CaptureOutcome = {
    status: 'completed',
    sessionId: input.session_id,
    project: projectFromCwd(input.cwd),
    agentName: UNKNOWN_AGENT,
    learnings: [],
    saved: 0,
    failed: 0,
  };

  logger.info(`SubagentStop fired. session=${outcome.sessionId} project=${outcome.project}`);

  if (!(await client.checkHealth())) {
    logger.warn('Capture service not running. Skipping passive capture.');
    return { ...outcome, status: 'service-unavailable' };
  }

  const agentTranscript = input.agent_transcript_path;
  if (!agentTranscript || !(await fileExists(agentTranscript))) {
    logger.warn(`No agent transcript available. Path: '${agentTranscript}'`);
    return { ...outcome, status: 'missing-transcript' };
  }

  outcome.agentName = await detectAgentName(input.transcript_path, logger);

  outcome.learnings = await extractLearnings(agentTranscript, logger, {
    minLength: config.minLearningLength,
  });
  if (outcome.learnings.length === 0) {
    logger.info(`No learning section found in transcript for agent=${outcome.agentName}`);
    return { ...outcome, status: 'no-learnings' };
  }

  for (const learning of outcome.learnings) {
    const record = buildObservation({
      learning,
      agentName: outcome.agentName,
      project: outcome.project,
      sessionId: outcome.sessionId,
      type: config.observationType,
      source: config.source,
      titleLength: config.titleLength,
      now: now(),
    });

    const id = await client.saveObservation(record);
    if (id) {
      outcome.saved += 1;
      logger.info(`Saved learning #${outcome.saved} obs_id=${id} agent=${outcome.agentName}`);
    } else {
      outcome.failed += 1;
      logger.warn(`Failed to save learning: ${headChars(learning, config.titleLength)}...`);
    }
  }

  logger.info(
    `Passive capture complete. Saved ${outcome.saved} learnings, ${outcome.failed} failed ` +
      `for agent=${outcome.agentName} session=${outcome.sessionId}`,
  );
  return outcome;
}

import * as path from 'path';
import { Logger, UNKNOWN_AGENT, logger } from '../core/index.js';
import { detectAgentName } from '../extraction/index.js';

interface DetectAgentOptions {
  json?: boolean;
}

export async function detectAgent(transcript: string, options: DetectAgentOptions): Promise<void> {
  const transcriptPath = path.resolve(transcript);
  const log = options.json ? new Logger({ quiet: true }) : logger;
  const agentName = await detectAgentName(transcriptPath, log);

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          success: true,
          transcript: transcriptPath,
          agentName,
          detected: agentName !== UNKNOWN_AGENT,
        },
        null,
        2,
      ),
    );
    return;
  }

  logger.log(agentName);
}

import * as path from 'path';
import { ConfigError, Logger, TranscriptError, fileExists, logger } from '../core/index.js';
import { DEFAULT_MIN_LEARNING_LENGTH, extractLearnings } from '../extraction/index.js';

interface ExtractOptions {
  json?: boolean;
  minLength?: string;
}

export interface ExtractResult {
  transcript: string;
  learnings: string[];
}

function parseMinLength(value?: string): number {
  if (value === undefined) return DEFAULT_MIN_LEARNING_LENGTH;
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`--min-length must be a non-negative integer, got "${value}"`);
  }
  return Number(value.trim());
}

export async function runExtraction(transcript: string, options: ExtractOptions = {}): Promise<ExtractResult> {
  const minLength = parseMinLength(options.minLength);
  const transcriptPath = path.resolve(transcript);
  if (!(await fileExists(transcriptPath))) {
    throw new TranscriptError(`Transcript not found: ${transcriptPath}`);
  }
  // Progress lines would corrupt JSON output.
  const log = options.json ? new Logger({ quiet: true }) : logger;
  const learnings = await extractLearnings(transcriptPath, log, { minLength });
  return { transcript: transcriptPath, learnings };
}

export async function extract(transcript: string, options: ExtractOptions): Promise<void> {
  const result = await runExtraction(transcript, options);

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          success: true,
          transcript: result.transcript,
          count: result.learnings.length,
          learnings: result.learnings,
          timestamp: new Date().toISOString(),
        },
        null,
        2,
      ),
    );
    return;
  }

  if (result.learnings.length === 0) {
    logger.warn('No learnings found.');
    return;
  }
  logger.success(`${result.learnings.length} learning(s) in ${result.transcript}`);
  result.learnings.forEach((learning, index) => {
    logger.log(`${index + 1}. ${learning}`);
  });
}

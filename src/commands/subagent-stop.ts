import {
  createHookLogger,
  loadCaptureConfig,
  resolveLogFile,
  withHookBoundary,
  type CaptureOutcome,
  type Env,
  type Logger,
} from '../core/index.js';
import {
  CaptureClient,
  parseHookInput,
  readStdin,
  runSubagentCapture,
  type FetchLike,
} from '../capture/index.js';

export interface SubagentStopOptions {
  env?: Env;
  stdin?: NodeJS.ReadableStream & { isTTY?: boolean };
  logger?: Logger;
  fetch?: FetchLike;
  now?: () => Date;
}

/**
 * Hook entry point. Resolves once the run is over and always leaves the
 * process with exit code 0; the outcome is undefined when the run aborted.
 */
export async function runSubagentStop(options: SubagentStopOptions = {}): Promise<CaptureOutcome | undefined> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createHookLogger(resolveLogFile(env));

  return withHookBoundary(logger, async () => {
    const input = parseHookInput(await readStdin(options.stdin), logger);
    const config = loadCaptureConfig(env);
    const client = new CaptureClient({
      baseUrl: config.baseUrl,
      healthTimeoutMs: config.healthTimeoutMs,
      saveTimeoutMs: config.saveTimeoutMs,
      logger,
      fetch: options.fetch,
    });
    return runSubagentCapture(input, { client, config, logger, now: options.now });
  });
}

// commander action
export async function subagentStop(): Promise<void> {
  await runSubagentStop();
}

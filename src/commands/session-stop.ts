import {
  SESSION_STOP_LOG,
  createHookLogger,
  loadCaptureConfig,
  resolveLogFile,
  withHookBoundary,
  type Env,
  type Logger,
  type SessionStopOutcome,
} from '../core/index.js';
import {
  CaptureClient,
  parseHookInput,
  readStdin,
  runSessionStopCheck,
  type FetchLike,
} from '../capture/index.js';

export interface SessionStopOptions {
  env?: Env;
  stdin?: NodeJS.ReadableStream & { isTTY?: boolean };
  logger?: Logger;
  fetch?: FetchLike;
}

/**
 * Stop hook entry point. Same contract as the sub-agent hook: exit code 0
 * on every path, undefined when the run aborted.
 */
export async function runSessionStop(options: SessionStopOptions = {}): Promise<SessionStopOutcome | undefined> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createHookLogger(resolveLogFile(env, SESSION_STOP_LOG), 'session-stop');

  return withHookBoundary(logger, async () => {
    const input = parseHookInput(await readStdin(options.stdin), logger);
    const config = loadCaptureConfig(env);
    const client = new CaptureClient({
      baseUrl: config.baseUrl,
      healthTimeoutMs: config.healthTimeoutMs,
      saveTimeoutMs: config.saveTimeoutMs,
      sessionTimeoutMs: config.sessionTimeoutMs,
      logger,
      fetch: options.fetch,
    });
    return runSessionStopCheck(input, { client, logger });
  });
}

// commander action
export async function sessionStop(): Promise<void> {
  await runSessionStop();
}

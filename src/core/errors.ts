/**
 * Error handling helpers
 */

import { logger as defaultLogger, type Logger } from './logger.js';

export class CaptureError extends Error {
  constructor(
    message: string,
    public code?: string,
  ) {
    super(message);
    this.name = 'CaptureError';
  }
}

export class ConfigError extends CaptureError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class TranscriptError extends CaptureError {
  constructor(message: string) {
    super(message, 'TRANSCRIPT_ERROR');
    this.name = 'TranscriptError';
  }
}

export class CaptureServiceError extends CaptureError {
  constructor(
    message: string,
    public status?: number,
  ) {
    super(message, 'SERVICE_ERROR');
    this.name = 'CaptureServiceError';
  }
}

export function toDisplayError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function describeError(error: unknown): string {
  if (error instanceof CaptureError && error.code) {
    return `${error.code}: ${error.message}`;
  }
  return toDisplayError(error);
}

/**
 * Outermost boundary of a hook run. Whatever `fn` does, the process is left
 * with exit code 0 and the failure only reaches the log.
 */
export async function withHookBoundary<R>(
  log: Logger,
  fn: () => Promise<R>,
): Promise<R | undefined> {
  try {
    return await fn();
  } catch (error) {
    log.warn(`Unexpected error in hook run: ${describeError(error)}`);
    return undefined;
  } finally {
    process.exitCode = 0;
  }
}

export function failCommand(message: string, error?: unknown, exitCode: number = 1): void {
  defaultLogger.error(message);
  if (error) {
    defaultLogger.error(toDisplayError(error));
  }
  process.exitCode = exitCode;
}

function extractJsonMode(args: unknown[]): boolean {
  for (let i = args.length - 1; i >= 0; i -= 1) {
    const candidate = args[i];
    if (!candidate || typeof candidate !== 'object') continue;
    if ('json' in candidate && typeof candidate.json === 'boolean') {
      return candidate.json;
    }
  }
  return false;
}

function emitCliJsonError(command: string, error: unknown): void {
  console.log(
    JSON.stringify(
      {
        success: false,
        error: toDisplayError(error),
        command,
        timestamp: new Date().toISOString(),
      },
      null,
      2,
    ),
  );
}

export function withCliErrorHandling<TArgs extends unknown[]>(
  command: string,
  handler: (...args: TArgs) => Promise<void> | void,
): (...args: TArgs) => Promise<void> {
  return async (...args: TArgs): Promise<void> => {
    try {
      await handler(...args);
    } catch (error) {
      if (extractJsonMode(args)) {
        emitCliJsonError(command, error);
        process.exitCode = 1;
        return;
      }
      failCommand(`Command "${command}" failed`, error);
    }
  };
}

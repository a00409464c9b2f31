/**
 * Configuration loading from the environment
 */

import * as os from 'os';
import * as path from 'path';
import { ConfigError } from './errors.js';

export type Env = Record<string, string | undefined>;

export interface CaptureConfig {
  baseUrl: string;
  logFile: string;
  healthTimeoutMs: number;
  saveTimeoutMs: number;
  sessionTimeoutMs: number;
  minLearningLength: number;
  observationType: string;
  source: string;
  titleLength: number;
}

export const DEFAULT_PORT = 7437;
const APP_DIR = 'learnings-capture';
export const SUBAGENT_STOP_LOG = 'subagent-stop.log';
export const SESSION_STOP_LOG = 'session-stop.log';

const DEFAULT_CONFIG: Omit<CaptureConfig, 'baseUrl' | 'logFile'> = {
  healthTimeoutMs: 2000,
  saveTimeoutMs: 5000,
  sessionTimeoutMs: 3000,
  minLearningLength: 20,
  observationType: 'learning',
  source: 'subagent-stop-hook',
  titleLength: 60,
};

export function parsePort(raw: string | undefined): number {
  const value = (raw ?? '').trim();
  if (!value) return DEFAULT_PORT;
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`CAPTURE_PORT must be an integer, got "${value}"`);
  }
  const port = Number(value);
  if (port < 1 || port > 65535) {
    throw new ConfigError(`CAPTURE_PORT out of range: ${port}`);
  }
  return port;
}

export function resolveBaseUrl(env: Env): string {
  const override = (env.CAPTURE_URL ?? '').trim();
  if (override) return override.replace(/\/+$/, '');
  return `http://127.0.0.1:${parsePort(env.CAPTURE_PORT)}`;
}

export function resolveLogFile(env: Env, fileName: string = SUBAGENT_STOP_LOG): string {
  const cacheRoot = (env.XDG_CACHE_HOME ?? '').trim() || path.join(os.homedir(), '.cache');
  return path.join(cacheRoot, APP_DIR, 'logs', fileName);
}

export function loadCaptureConfig(env: Env = process.env): CaptureConfig {
  return Object.freeze({
    ...DEFAULT_CONFIG,
    baseUrl: resolveBaseUrl(env),
    logFile: resolveLogFile(env),
  });
}

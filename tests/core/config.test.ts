import { describe, it, expect } from '@jest/globals';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../../src/core/errors.js';
import {
  DEFAULT_PORT,
  loadCaptureConfig,
  parsePort,
  resolveBaseUrl,
  resolveLogFile,
  SESSION_STOP_LOG,
} from '../../src/core/config.js';

describe('Config', () => {
  it('should use defaults for an empty environment', () => {
    const config = loadCaptureConfig({});
    expect(config.baseUrl).toBe('http://127.0.0.1:7437');
    expect(config.logFile).toBe(path.join(os.homedir(), '.cache', 'learnings-capture', 'logs', 'subagent-stop.log'));
    expect(config.healthTimeoutMs).toBe(2000);
    expect(config.saveTimeoutMs).toBe(5000);
    expect(config.sessionTimeoutMs).toBe(3000);
    expect(config.minLearningLength).toBe(20);
    expect(config.observationType).toBe('learning');
    expect(config.source).toBe('subagent-stop-hook');
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should read the port from the environment', () => {
    expect(resolveBaseUrl({ CAPTURE_PORT: '9100' })).toBe('http://127.0.0.1:9100');
  });

  it('should prefer an explicit base URL', () => {
    expect(resolveBaseUrl({ CAPTURE_URL: 'http://capture.local:8080//', CAPTURE_PORT: '9100' })).toBe(
      'http://capture.local:8080',
    );
  });

  it('should place the log under XDG_CACHE_HOME', () => {
    expect(resolveLogFile({ XDG_CACHE_HOME: '/tmp/cache-root' })).toBe(
      path.join('/tmp/cache-root', 'learnings-capture', 'logs', 'subagent-stop.log'),
    );
  });

  it('should give each hook its own log file', () => {
    expect(resolveLogFile({ XDG_CACHE_HOME: '/tmp/cache-root' }, SESSION_STOP_LOG)).toBe(
      path.join('/tmp/cache-root', 'learnings-capture', 'logs', 'session-stop.log'),
    );
  });

  it('should reject invalid ports', () => {
    expect(parsePort(undefined)).toBe(DEFAULT_PORT);
    expect(parsePort('  ')).toBe(DEFAULT_PORT);
    expect(() => parsePort('abc')).toThrow(ConfigError);
    expect(() => parsePort('70000')).toThrow('CAPTURE_PORT out of range: 70000');
    expect(() => parsePort('0')).toThrow(ConfigError);
  });
});

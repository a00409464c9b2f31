import { describe, it, expect, jest } from '@jest/globals';
import { Readable } from 'stream';
import { Logger } from '../../src/core/logger.js';
import { EMPTY_HOOK_INPUT, parseHookInput, projectFromCwd, readStdin } from '../../src/capture/hook-input.js';

describe('parseHookInput', () => {
  const logger = new Logger({ quiet: true });

  it('reads the known string fields', () => {
    const raw = JSON.stringify({
      session_id: 'sess-1',
      agent_transcript_path: '/tmp/agent.jsonl',
      transcript_path: '/tmp/parent.jsonl',
      cwd: '/work/proj',
      hook_event_name: 'SubagentStop',
    });
    expect(parseHookInput(raw, logger)).toEqual({
      session_id: 'sess-1',
      agent_transcript_path: '/tmp/agent.jsonl',
      transcript_path: '/tmp/parent.jsonl',
      cwd: '/work/proj',
    });
  });

  it('defaults absent and non-string fields to empty strings', () => {
    expect(parseHookInput('{"session_id": 12, "cwd": null}', logger)).toEqual(EMPTY_HOOK_INPUT);
  });

  it('substitutes an empty envelope for blank input', () => {
    expect(parseHookInput('  \n', logger)).toEqual(EMPTY_HOOK_INPUT);
  });

  it('substitutes an empty envelope for malformed JSON and warns', () => {
    const warn = jest.spyOn(logger, 'warn');
    expect(parseHookInput('{"session_id":', logger)).toEqual(EMPTY_HOOK_INPUT);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining('Invalid JSON from stdin'));
    warn.mockRestore();
  });

  it('substitutes an empty envelope for non-object JSON', () => {
    expect(parseHookInput('["a"]', logger)).toEqual(EMPTY_HOOK_INPUT);
  });
});

describe('projectFromCwd', () => {
  it('uses the final path segment', () => {
    expect(projectFromCwd('/work/proj')).toBe('proj');
    expect(projectFromCwd('/work/proj/')).toBe('proj');
  });

  it('falls back to unknown', () => {
    expect(projectFromCwd('')).toBe('unknown');
    expect(projectFromCwd('/')).toBe('unknown');
  });
});

describe('readStdin', () => {
  it('collects the whole stream', async () => {
    await expect(readStdin(Readable.from(['{"session_id":', '"abc"}']))).resolves.toBe('{"session_id":"abc"}');
  });

  it('returns an empty string for a terminal', async () => {
    const tty = Object.assign(Readable.from([]), { isTTY: true });
    await expect(readStdin(tty)).resolves.toBe('');
  });
});

import { describe, it, expect, jest, beforeAll, afterAll, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { Logger } from '../../src/core/logger.js';
import {
  collectTranscriptFragments,
  reconstructTranscriptText,
  unescapeNewlines,
} from '../../src/extraction/transcript.js';
import { assistantText, taskResult, writeJsonl } from '../helpers/transcripts.js';

describe('collectTranscriptFragments', () => {
  it('collects assistant text blocks and skips other block types', () => {
    const record = {
      type: 'assistant',
      message: {
        content: [
          { type: 'text', text: 'first' },
          { type: 'tool_use', name: 'Bash', input: {} },
          { type: 'text', text: '' },
          { type: 'text', text: 'second' },
        ],
      },
    };
    expect(collectTranscriptFragments([record])).toEqual(['first', 'second']);
  });

  it('collects list-shaped tool results and unescapes newlines', () => {
    expect(collectTranscriptFragments([taskResult('line one\\nline two')])).toEqual(['line one\nline two']);
  });

  it('ignores string tool results inside user messages', () => {
    const record = {
      type: 'user',
      message: { content: [{ type: 'tool_result', content: '## Learnings\n1. From a shell command output' }] },
    };
    expect(collectTranscriptFragments([record])).toEqual([]);
  });

  it('includes legacy top-level tool results with string content', () => {
    const records = [
      { type: 'tool_result', content: 'legacy\\noutput' },
      { type: 'tool_result', content: [{ type: 'text', text: 'list content is skipped' }] },
    ];
    expect(collectTranscriptFragments(records)).toEqual(['legacy\noutput']);
  });

  it('keeps file order and duplicates', () => {
    const records = [assistantText('a'), taskResult('b'), assistantText('a')];
    expect(collectTranscriptFragments(records)).toEqual(['a', 'b', 'a']);
  });

  it('tolerates records with unexpected shapes', () => {
    const records = [
      { type: 'assistant', message: 'plain string' },
      { type: 'assistant', message: { content: 'not a list' } },
      { type: 'user', message: { content: [null, 3, { type: 'tool_result' }] } },
    ];
    expect(collectTranscriptFragments(records)).toEqual([]);
  });
});

describe('unescapeNewlines', () => {
  it('replaces literal backslash-n sequences', () => {
    expect(unescapeNewlines('a\\nb\\n\\nc')).toBe('a\nb\n\nc');
  });
});

describe('reconstructTranscriptText', () => {
  let tempDir: string;
  const logger = new Logger({ quiet: true });

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'learnings-transcript-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('joins fragments with newlines and skips malformed lines', async () => {
    const transcript = await writeJsonl(tempDir, 'mixed.jsonl', [
      assistantText('first'),
      '{"type": "assistant", broken',
      '',
      taskResult('second'),
      '[1, 2, 3]',
      assistantText('third'),
    ]);
    await expect(reconstructTranscriptText(transcript, logger)).resolves.toBe('first\nsecond\nthird');
  });

  it('returns empty text and warns when the file is missing', async () => {
    const warn = jest.spyOn(logger, 'warn');
    const missing = path.join(tempDir, 'nope.jsonl');

    await expect(reconstructTranscriptText(missing, logger)).resolves.toBe('');
    expect(warn).toHaveBeenCalledWith(`Error extracting text from transcript: File not found: ${missing}`);
  });

  it('returns empty text for an empty path', async () => {
    await expect(reconstructTranscriptText('', logger)).resolves.toBe('');
  });
});

/**
 * File I/O utilities with error handling
 */

import * as fs from 'fs';
import * as fsPromises from 'fs/promises';
import * as readline from 'readline';
import { TranscriptError } from './errors.js';
import { isJsonObject, type JsonObject } from './types.js';

export async function fileExists(filePath: string): Promise<boolean> {
  if (!filePath) return false;
  try {
    await fsPromises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

async function openForReading(filePath: string): Promise<fsPromises.FileHandle> {
  try {
    return await fsPromises.open(filePath, 'r');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new TranscriptError(`File not found: ${filePath}`);
    }
    throw error;
  }
}

export function parseJsonLine(rawLine: string): JsonObject | null {
  const line = rawLine.trim();
  if (!line) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  return isJsonObject(parsed) ? parsed : null;
}

/**
 * Parse a JSON-lines file one line at a time. Blank lines, lines that are
 * not valid JSON and lines holding anything other than an object are
 * dropped; order is kept.
 */
export async function readJsonLines(filePath: string): Promise<JsonObject[]> {
  const handle = await openForReading(filePath);
  const records: JsonObject[] = [];
  try {
    const lines = readline.createInterface({
      input: handle.createReadStream({ encoding: 'utf-8', autoClose: false }),
      crlfDelay: Infinity,
    });
    for await (const line of lines) {
      const record = parseJsonLine(line);
      if (record) records.push(record);
    }
  } finally {
    await handle.close();
  }
  return records;
}

// src/rawResponseWriter.ts
// This module handles writing raw API responses to JSONL files with metadata.
// Each line contains: {"metadata": {...}, "response": {...}}

import * as fs from 'fs/promises';
import type { ResponseRecord } from './api';
import type { AlertCategory } from './categories';
import type { Logger } from './logger';
import type { TargetKind } from './targets';

/**
 * Metadata attached to each raw API response
 */
export type RawResponseMetadata = {
  category: AlertCategory;
  targetKind: TargetKind;
  target: string;     // org name, or owner/repo
  url: string;
  status: number;
  timestamp: string;  // ISO 8601 timestamp
};

/**
 * Structure of each line in the JSONL file
 */
export type RawResponseEntry = {
  metadata: RawResponseMetadata;
  response: unknown; // The decoded response body
};

export function toRawResponseEntry(record: ResponseRecord, now: Date = new Date()): RawResponseEntry {
  const { target } = record;
  return {
    metadata: {
      category: record.category,
      targetKind: target.kind,
      target: target.kind === 'organization' ? target.name : `${target.owner}/${target.name}`,
      url: record.url,
      status: record.status,
      timestamp: now.toISOString(),
    },
    response: record.body,
  };
}

/**
 * Appends a raw API response to a JSONL file with metadata.
 * Creates the file if it doesn't exist. Write failures are logged, not thrown.
 *
 * @param filePath - Path to the JSONL file
 */
export async function appendRawResponse(filePath: string, record: ResponseRecord, logger: Logger): Promise<void> {
  try {
    const line = JSON.stringify(toRawResponseEntry(record)) + '\n';
    await fs.appendFile(filePath, line, 'utf-8');
  } catch (error) {
    logger.error(`Failed to write raw response to ${filePath}:`, error);
  }
}

/**
 * Reads back every entry of a JSONL audit file, skipping blank lines.
 */
export async function readRawResponses(filePath: string): Promise<RawResponseEntry[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return content
    .split('\n')
    .filter((line) => line.trim())
    .map((line): RawResponseEntry => JSON.parse(line));
}

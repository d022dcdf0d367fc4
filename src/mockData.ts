// src/mockData.ts
// Mock mode: answers alert requests from stored JSON files instead of the live API.
//
// File names are derived from the request path:
//   /orgs/acme-corp/code-scanning/alerts         -> orgs_acme-corp_code-scanning.json
//   /repos/acme-corp/ledger/dependabot/alerts    -> repos_acme-corp_ledger_dependabot.json
//
// A file holds either the alert array itself, or {"status": 404, "body": {...}} to
// replay an error response.

import * as fs from 'fs/promises';
import * as path from 'path';
import type { HttpResponse, HttpTransport } from './api';
import { isRecord } from './normalizers';

const ALERTS_PATH = /\/(orgs|repos)\/(.+)\/([a-z-]+)\/alerts$/;

export function mockFileName(url: string): string | undefined {
  const match = ALERTS_PATH.exec(new URL(url).pathname);
  if (!match) return undefined;
  const [, scope, target, category] = match;
  const parts = target.split('/').map((part) => decodeURIComponent(part));
  return `${[scope, ...parts, category].join('_')}.json`;
}

function jsonResponse(status: number, body: unknown): HttpResponse {
  const text = JSON.stringify(body);
  return {
    status,
    headers: { get: () => null },
    text: async () => text,
  };
}

/**
 * Transport reading responses from `mockDir`. Pagination is not simulated.
 */
export function createMockTransport(mockDir: string): HttpTransport {
  return async (url) => {
    const fileName = mockFileName(url);
    if (!fileName) {
      return jsonResponse(404, { message: `No mock mapping for ${url}` });
    }

    let content: string;
    try {
      content = await fs.readFile(path.join(mockDir, fileName), 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return jsonResponse(404, { message: `Mock file not found: ${fileName}` });
      }
      throw error;
    }

    const stored: unknown = JSON.parse(content);
    if (isRecord(stored) && typeof stored.status === 'number') {
      return jsonResponse(stored.status, stored.body);
    }
    return jsonResponse(200, stored);
  };
}

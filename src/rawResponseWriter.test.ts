import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ResponseRecord } from './api';
import { silentLogger } from './logger';
import { appendRawResponse, readRawResponses, toRawResponseEntry } from './rawResponseWriter';

const record: ResponseRecord = {
  category: 'dependabot',
  target: { kind: 'repository', name: 'ledger', owner: 'acme-corp' },
  url: 'https://api.test/repos/acme-corp/ledger/dependabot/alerts?state=open&per_page=100',
  status: 200,
  body: [{ number: 12 }],
};

describe('toRawResponseEntry', () => {
  it('wraps the body with request metadata', () => {
    expect(toRawResponseEntry(record, new Date('2024-01-15T10:30:00.000Z'))).toEqual({
      metadata: {
        category: 'dependabot',
        targetKind: 'repository',
        target: 'acme-corp/ledger',
        url: record.url,
        status: 200,
        timestamp: '2024-01-15T10:30:00.000Z',
      },
      response: [{ number: 12 }],
    });
  });
});

describe('appendRawResponse', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'alert-reporter-raw-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('appends one line per response', async () => {
    const filePath = path.join(dir, 'raw.jsonl');
    const failure: ResponseRecord = {
      category: 'code-scanning',
      target: { kind: 'organization', name: 'acme-corp' },
      url: 'https://api.test/orgs/acme-corp/code-scanning/alerts?state=open&per_page=100',
      status: 404,
      body: { message: 'no analysis found' },
    };

    await appendRawResponse(filePath, record, silentLogger);
    await appendRawResponse(filePath, failure, silentLogger);

    const entries = await readRawResponses(filePath);
    expect(entries).toHaveLength(2);
    expect(entries[0].response).toEqual([{ number: 12 }]);
    expect(entries[1].metadata).toMatchObject({ target: 'acme-corp', targetKind: 'organization', status: 404 });
  });

  it('logs instead of throwing when the file cannot be written', async () => {
    const error = vi.fn();
    const filePath = path.join(dir, 'missing', 'raw.jsonl');

    await appendRawResponse(filePath, record, { ...silentLogger, error });

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toBe(`Failed to write raw response to ${filePath}:`);
  });
});

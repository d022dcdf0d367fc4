import { describe, expect, it, vi } from 'vitest';
import { collectProjectReport, formatDiagnostic, headerFor } from './aggregator';
import { AlertFetcher, type AlertSource, type FetchResult } from './api';
import type { AlertCategory } from './categories';
import type { NamedProject } from './config';
import { UnauthorizedError } from './errors';
import type { Target } from './targets';
import {
  FakeTransport,
  TEST_API,
  alertsUrl,
  codeScanningAlert,
  dependabotAlert,
  secretScanningAlert,
} from './testing/fakeTransport';

function project(config: NamedProject['config'], name = 'payments'): NamedProject {
  return { name, config };
}

function fetcherFor(transport: FakeTransport): AlertFetcher {
  return new AlertFetcher(TEST_API, { transport: transport.handler });
}

const repoUrl = (repo: string, category: AlertCategory) => alertsUrl(`repos/acme-corp/${repo}`, category);

describe('collectProjectReport (counts)', () => {
  it('counts the open alerts of an organization', async () => {
    const transport = new FakeTransport()
      .on(alertsUrl('orgs/acme-corp', 'code-scanning'), {
        body: [
          codeScanningAlert({ rule: { id: 'a', security_severity_level: 'critical' } }),
          codeScanningAlert({ rule: { id: 'b', security_severity_level: 'medium' } }),
        ],
      })
      .on(alertsUrl('orgs/acme-corp', 'secret-scanning'), { body: [secretScanningAlert()] })
      .on(alertsUrl('orgs/acme-corp', 'dependabot'), { body: [] });

    const report = await collectProjectReport('counts', project({ organizations: ['acme-corp'] }), fetcherFor(transport));

    expect(report.header).toEqual([
      'Organization',
      'Repository',
      'Code Scanning Alerts',
      'Secret Scanning Alerts',
      'Dependabot Alerts',
    ]);
    expect(report.rows).toEqual([['acme-corp', 'N/A', 2, 1, 0]]);
    expect(report.diagnostics).toEqual([]);
  });

  it('counts every item the API returned', async () => {
    const transport = new FakeTransport()
      .on(alertsUrl('orgs/acme-corp', 'code-scanning'), { body: [codeScanningAlert(), 'stray'] })
      .on(alertsUrl('orgs/acme-corp', 'secret-scanning'), { body: [] })
      .on(alertsUrl('orgs/acme-corp', 'dependabot'), { body: [] });

    const report = await collectProjectReport('counts', project({ organizations: ['acme-corp'] }), fetcherFor(transport));

    expect(report.rows).toEqual([['acme-corp', 'N/A', 2, 0, 0]]);
  });

  it('emits one row per target, organizations first', async () => {
    const transport = new FakeTransport();
    for (const category of ['code-scanning', 'secret-scanning', 'dependabot'] as const) {
      transport.on(alertsUrl('orgs/acme-corp', category), { body: [] });
      transport.on(repoUrl('ledger', category), { body: [{ number: 1 }] });
    }

    const report = await collectProjectReport(
      'counts',
      project({ repositories: ['ledger'], organizations: ['acme-corp'], owner: 'acme-corp' }),
      fetcherFor(transport)
    );

    expect(report.rows).toEqual([
      ['acme-corp', 'N/A', 0, 0, 0],
      ['N/A', 'ledger', 1, 1, 1],
    ]);
  });

  it('drops the row of a target whose fetch failed and reports it', async () => {
    const transport = new FakeTransport();
    for (const repo of ['ledger', 'checkout']) {
      for (const category of ['code-scanning', 'secret-scanning', 'dependabot'] as const) {
        transport.on(repoUrl(repo, category), { body: [] });
      }
    }
    transport.on(repoUrl('ledger', 'secret-scanning'), {
      status: 404,
      body: { message: 'Secret scanning is disabled on this repository.' },
    });
    const onDiagnostic = vi.fn();

    const report = await collectProjectReport(
      'counts',
      project({ repositories: ['ledger', 'checkout'], owner: 'acme-corp' }),
      fetcherFor(transport),
      { onDiagnostic }
    );

    expect(report.rows).toEqual([['N/A', 'checkout', 0, 0, 0]]);
    expect(onDiagnostic).toHaveBeenCalledTimes(1);
    expect(formatDiagnostic(report.diagnostics[0])).toBe(
      '[secret-scanning] repository acme-corp/ledger: NotFound (404) - Secret scanning is disabled on this repository.'
    );
  });
});

describe('collectProjectReport (details)', () => {
  it('normalizes every alert of every target in order', async () => {
    const transport = new FakeTransport()
      .on(alertsUrl('orgs/acme-corp', 'code-scanning'), {
        body: [codeScanningAlert({ number: 1 }), codeScanningAlert({ number: 2, html_url: 'u2' })],
      })
      .on(repoUrl('ledger', 'code-scanning'), { body: [codeScanningAlert({ number: 3, html_url: 'u3' })] });

    const report = await collectProjectReport(
      'code-scanning',
      project({ organizations: ['acme-corp'], repositories: ['ledger'], owner: 'acme-corp' }),
      fetcherFor(transport)
    );

    expect(report.header).toEqual(headerFor('code-scanning'));
    expect(report.rows).toHaveLength(3);
    expect(report.rows.map((row) => row[0])).toEqual(['acme-corp', 'acme-corp', 'acme-corp']);
    expect(report.rows.map((row) => row[9])).toEqual([
      'https://github.test/acme-corp/ledger/security/code-scanning/7',
      'u2',
      'u3',
    ]);
    expect(report.rows.every((row) => row.length === report.header.length)).toBe(true);
  });

  it('only queries the requested category', async () => {
    const transport = new FakeTransport().on(repoUrl('ledger', 'dependabot'), { body: [dependabotAlert()] });

    await collectProjectReport('dependabot', project({ repositories: ['ledger'], owner: 'acme-corp' }), fetcherFor(transport));

    expect(transport.requestedUrls()).toEqual([repoUrl('ledger', 'dependabot')]);
  });

  it('keeps the other targets when one is not found', async () => {
    const transport = new FakeTransport()
      .on(repoUrl('a', 'secret-scanning'), { body: [secretScanningAlert({ html_url: 'a1' })] })
      .on(repoUrl('c', 'secret-scanning'), {
        body: [secretScanningAlert({ html_url: 'c1' }), secretScanningAlert({ html_url: 'c2' })],
      });

    const report = await collectProjectReport(
      'secret-scanning',
      project({ repositories: ['a', 'b', 'c'], owner: 'acme-corp' }),
      fetcherFor(transport)
    );

    expect(report.rows.map((row) => [row[1], row[6]])).toEqual([
      ['a', 'a1'],
      ['c', 'c1'],
      ['c', 'c2'],
    ]);
    expect(report.diagnostics).toHaveLength(1);
    expect(report.diagnostics[0]).toMatchObject({ kind: 'NotFound', status: 404, category: 'secret-scanning' });
    expect(report.diagnostics[0].target).toEqual({ kind: 'repository', name: 'b', owner: 'acme-corp' });
  });

  it('turns transport faults into diagnostics', async () => {
    const transport = new FakeTransport()
      .on(repoUrl('a', 'dependabot'), { error: new Error('ECONNRESET') })
      .on(repoUrl('b', 'dependabot'), { body: [dependabotAlert()] });

    const report = await collectProjectReport(
      'dependabot',
      project({ repositories: ['a', 'b'], owner: 'acme-corp' }),
      fetcherFor(transport)
    );

    expect(report.rows).toHaveLength(1);
    expect(formatDiagnostic(report.diagnostics[0])).toBe('[dependabot] repository acme-corp/a: Transport - ECONNRESET');
  });

  it('skips a single alert with an unusable timestamp', async () => {
    const transport = new FakeTransport().on(alertsUrl('orgs/acme-corp', 'code-scanning'), {
      body: [
        codeScanningAlert({ number: 4 }),
        codeScanningAlert({ number: 5, created_at: 'N/A' }),
        codeScanningAlert({ number: 6 }),
      ],
    });

    const report = await collectProjectReport('code-scanning', project({ organizations: ['acme-corp'] }), fetcherFor(transport));

    expect(report.rows).toHaveLength(2);
    expect(report.diagnostics).toHaveLength(1);
    expect(formatDiagnostic(report.diagnostics[0])).toBe(
      '[code-scanning] organization acme-corp alert #5: DateParseError - Cannot parse created_at "N/A" (expected yyyy-MM-ddTHH:mm:ssZ)'
    );
  });

  it('reports response items that are not alert objects', async () => {
    const transport = new FakeTransport().on(alertsUrl('orgs/acme-corp', 'dependabot'), {
      body: [dependabotAlert(), 'stray'],
    });

    const report = await collectProjectReport('dependabot', project({ organizations: ['acme-corp'] }), fetcherFor(transport));

    expect(report.rows).toHaveLength(1);
    expect(formatDiagnostic(report.diagnostics[0])).toBe(
      '[dependabot] organization acme-corp: MalformedAlert - 1 of 2 items in the response were not alert objects'
    );
  });

  it('uses the legacy secret scanning layout when asked', async () => {
    const transport = new FakeTransport().on(alertsUrl('orgs/acme-corp', 'secret-scanning'), {
      body: [secretScanningAlert()],
    });

    const report = await collectProjectReport(
      'secret-scanning',
      project({ organizations: ['acme-corp'] }),
      fetcherFor(transport),
      { legacySecretScanningLayout: true }
    );

    expect(report.header[2]).toBe('Repository Name');
    expect(report.rows[0]).toHaveLength(8);
  });
});

describe('collectProjectReport (unauthorized)', () => {
  it('halts without querying later targets', async () => {
    const transport = new FakeTransport()
      .on(repoUrl('a', 'code-scanning'), { body: [codeScanningAlert()] })
      .on(repoUrl('b', 'code-scanning'), { status: 401, body: { message: 'Bad credentials' } })
      .on(repoUrl('c', 'code-scanning'), { body: [codeScanningAlert()] });

    const run = collectProjectReport(
      'code-scanning',
      project({ repositories: ['a', 'b', 'c'], owner: 'acme-corp' }),
      fetcherFor(transport)
    );

    await expect(run).rejects.toBeInstanceOf(UnauthorizedError);
    await expect(run).rejects.toThrow(
      'Authentication failed while fetching code-scanning alerts for repository acme-corp/b: Bad credentials'
    );
    expect(transport.requestedUrls()).toEqual([repoUrl('a', 'code-scanning'), repoUrl('b', 'code-scanning')]);
  });

  it('cancels fetches still in flight when another target is rejected', async () => {
    const first = repoUrl('r1', 'dependabot');
    const pages = [first, `${first}&page=2`, `${first}&page=3`, `${first}&page=4`];
    const transport = new FakeTransport().on(repoUrl('r2', 'dependabot'), {
      status: 401,
      body: { message: 'Bad credentials' },
    });
    pages.forEach((url, index) => {
      const next = pages[index + 1];
      transport.on(url, {
        delay: 20,
        body: [dependabotAlert({ number: index + 1 })],
        link: next === undefined ? undefined : `<${next}>; rel="next"`,
      });
    });
    const seen: string[] = [];
    const source = new AlertFetcher(TEST_API, {
      transport: transport.handler,
      onResponse: (record) => {
        seen.push(record.url);
      },
    });

    await expect(
      collectProjectReport('dependabot', project({ repositories: ['r1', 'r2'], owner: 'acme-corp' }), source, {
        concurrency: 2,
      })
    ).rejects.toBeInstanceOf(UnauthorizedError);

    expect(transport.requestedUrls()).toEqual([first, repoUrl('r2', 'dependabot')]);
    expect(transport.requests[0].signal?.aborted).toBe(true);
    expect(seen).toEqual([repoUrl('r2', 'dependabot')]);
  });

  it('reports nothing for a project whose credential was rejected', async () => {
    const transport = new FakeTransport()
      .on(repoUrl('a', 'dependabot'), { status: 404, body: { message: 'Not Found' } })
      .on(repoUrl('b', 'dependabot'), { status: 401, body: { message: 'Bad credentials' } });
    const onDiagnostic = vi.fn();

    await expect(
      collectProjectReport('dependabot', project({ repositories: ['a', 'b'], owner: 'acme-corp' }), fetcherFor(transport), {
        onDiagnostic,
      })
    ).rejects.toBeInstanceOf(UnauthorizedError);
    expect(onDiagnostic).not.toHaveBeenCalled();
  });

  it('stops the count report at the first rejected request', async () => {
    const transport = new FakeTransport()
      .on(repoUrl('a', 'code-scanning'), { status: 401, body: {} });

    await expect(
      collectProjectReport('counts', project({ repositories: ['a', 'b'], owner: 'acme-corp' }), fetcherFor(transport))
    ).rejects.toBeInstanceOf(UnauthorizedError);
    expect(transport.requests).toHaveLength(1);
  });
});

describe('collectProjectReport (concurrency)', () => {
  const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

  class ScriptedSource implements AlertSource {
    readonly started: string[] = [];

    constructor(private readonly script: (target: Target) => { wait: number; result: FetchResult }) {}

    async fetch(_category: AlertCategory, target: Target): Promise<FetchResult> {
      this.started.push(target.name);
      const { wait, result } = this.script(target);
      await delay(wait);
      return result;
    }
  }

  it('restores target order when later fetches finish first', async () => {
    const names = ['r1', 'r2', 'r3', 'r4', 'r5'];
    const source = new ScriptedSource((target) => ({
      wait: (names.length - names.indexOf(target.name)) * 5,
      result: { ok: true, alerts: [dependabotAlert({ html_url: target.name })], count: 1, malformed: 0 },
    }));

    const report = await collectProjectReport(
      'dependabot',
      project({ repositories: names, owner: 'acme-corp' }),
      source,
      { concurrency: 3 }
    );

    expect(report.rows.map((row) => row[1])).toEqual(names);
    expect(report.rows.map((row) => row[10])).toEqual(names);
  });

  it('does not start queued fetches after an unauthorized result', async () => {
    const source = new ScriptedSource((target) =>
      target.name === 'r2'
        ? { wait: 0, result: { ok: false, kind: 'Unauthorized', status: 401, detail: 'Bad credentials' } }
        : { wait: 20, result: { ok: true, alerts: [], count: 0, malformed: 0 } }
    );

    await expect(
      collectProjectReport(
        'dependabot',
        project({ repositories: ['r1', 'r2', 'r3', 'r4', 'r5'], owner: 'acme-corp' }),
        source,
        { concurrency: 2 }
      )
    ).rejects.toBeInstanceOf(UnauthorizedError);
    expect(source.started).toEqual(['r1', 'r2']);
  });
});

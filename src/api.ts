// src/api.ts
// This module encapsulates all interactions with the GitHub REST alerts endpoints.
//
// Every alert category shares one fetch path; only the URL segment differs:
//   GET {base}/orgs/{org}/{category}/alerts?state=open
//   GET {base}/repos/{owner}/{repo}/{category}/alerts?state=open
//
// HTTP-level failures are returned as classified FetchResult values. Only transport
// faults (DNS, connection reset, ...) are thrown.

import fetch from 'node-fetch';
import type { AlertCategory } from './categories';
import type { ApiSettings } from './config';
import { type Logger, silentLogger } from './logger';
import { type RawAlert, isRecord } from './normalizers';
import { type Target, describeTarget } from './targets';

const DEFAULT_PER_PAGE = 100;
const USER_AGENT = 'security-alert-reporter';

// ============================================================================
// TRANSPORT
// ============================================================================

export interface HttpResponse {
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export interface HttpRequestInit {
  headers: Record<string, string>;
  signal?: AbortSignal;
}

export type HttpTransport = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

/**
 * Transport backed by node-fetch.
 */
export function createHttpTransport(): HttpTransport {
  return (url, init) => fetch(url, { method: 'GET', headers: init.headers, signal: init.signal });
}

// ============================================================================
// RESULTS
// ============================================================================

export type ErrorKind =
  | 'BadRequest'
  | 'Unauthorized'
  | 'Forbidden'
  | 'NotFound'
  | 'Unprocessable'
  | 'ServiceUnavailable'
  | 'Unknown'
  | 'Transport'
  | 'Cancelled';

export type FetchResult =
  // count is the number of items the API returned; malformed of them were not objects
  | { ok: true; alerts: RawAlert[]; count: number; malformed: number }
  | { ok: false; kind: ErrorKind; status?: number; detail: string };

/**
 * Anything that can produce the open alerts of one category for one target.
 */
export interface AlertSource {
  fetch(category: AlertCategory, target: Target, signal?: AbortSignal): Promise<FetchResult>;
}

export interface ResponseRecord {
  category: AlertCategory;
  target: Target;
  url: string;
  status: number;
  body: unknown;
}

export interface AlertFetcherOptions {
  transport?: HttpTransport;
  // Follow Link rel="next" headers (default true)
  paginate?: boolean;
  perPage?: number;
  // Called with every page received, successful or not
  onResponse?: (record: ResponseRecord) => void | Promise<void>;
  logger?: Logger;
}

export function classifyStatus(status: number): ErrorKind {
  switch (status) {
    case 400:
      return 'BadRequest';
    case 401:
      return 'Unauthorized';
    case 403:
      return 'Forbidden';
    case 404:
      return 'NotFound';
    case 422:
      return 'Unprocessable';
    case 503:
      return 'ServiceUnavailable';
    default:
      return 'Unknown';
  }
}

function genericErrorMessage(status: number, target: Target, apiVersion: string): string {
  const label = describeTarget(target);
  switch (status) {
    case 400:
      return `GitHub API version "${apiVersion}" not supported, check the API version in the configuration.`;
    case 401:
      return 'Authentication failed. Please check your API key.';
    case 403:
      return `Access to ${label} is forbidden. Please check your API key permissions.`;
    case 404:
      return `${label} not found.`;
    case 422:
      return `The alerts query for ${label} could not be processed.`;
    case 503:
      return 'GitHub API is currently unavailable. Please try again later.';
    default:
      return `Unexpected response status ${status} for ${label}.`;
  }
}

/**
 * Builds the error detail from the response body: its `message`, followed by the
 * `errors` field when present. Falls back to a message keyed by status code.
 */
export function buildErrorDetail(status: number, body: unknown, target: Target, apiVersion: string): string {
  if (!isRecord(body) || typeof body.message !== 'string' || body.message === '') {
    return genericErrorMessage(status, target, apiVersion);
  }
  const { message, errors } = body;
  if (errors === undefined || errors === null) {
    return message;
  }
  return `${message}: ${typeof errors === 'string' ? errors : JSON.stringify(errors)}`;
}

/**
 * Extracts the rel="next" URL from a GitHub Link header.
 */
export function parseNextLink(linkHeader: string | null): string | undefined {
  if (!linkHeader) return undefined;
  for (const part of linkHeader.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="next"/.exec(part);
    if (match) return match[1];
  }
  return undefined;
}

function parseBody(text: string): unknown {
  if (text.trim() === '') return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function cancelled(url: string): FetchResult {
  return { ok: false, kind: 'Cancelled', detail: `Fetch cancelled at ${url}` };
}

// ============================================================================
// FETCHER
// ============================================================================

export class AlertFetcher implements AlertSource {
  private readonly settings: ApiSettings;
  private readonly transport: HttpTransport;
  private readonly paginate: boolean;
  private readonly perPage: number;
  private readonly onResponse?: AlertFetcherOptions['onResponse'];
  private readonly logger: Logger;

  constructor(settings: ApiSettings, options: AlertFetcherOptions = {}) {
    this.settings = settings;
    this.transport = options.transport ?? createHttpTransport();
    this.paginate = options.paginate ?? true;
    this.perPage = options.perPage ?? DEFAULT_PER_PAGE;
    this.onResponse = options.onResponse;
    this.logger = options.logger ?? silentLogger;
  }

  get headers(): Record<string, string> {
    return {
      Accept: 'application/vnd.github+json',
      Authorization: `token ${this.settings.token}`,
      'X-GitHub-Api-Version': this.settings.apiVersion,
      'User-Agent': USER_AGENT,
    };
  }

  alertsUrl(category: AlertCategory, target: Target): string {
    const base = this.settings.baseUrl.replace(/\/+$/, '');
    const scope =
      target.kind === 'organization'
        ? `orgs/${encodeURIComponent(target.name)}`
        : `repos/${encodeURIComponent(target.owner)}/${encodeURIComponent(target.name)}`;
    return `${base}/${scope}/${category}/alerts?state=open&per_page=${this.perPage}`;
  }

  /**
   * Reads every page of open alerts. Once `signal` is aborted no further page is
   * requested and the pages already read are dropped.
   */
  async fetch(category: AlertCategory, target: Target, signal?: AbortSignal): Promise<FetchResult> {
    const alerts: RawAlert[] = [];
    const visited = new Set<string>();
    let count = 0;
    let url: string | undefined = this.alertsUrl(category, target);

    while (url) {
      if (signal?.aborted) return cancelled(url);
      visited.add(url);

      this.logger.verbose(`[API] GET ${url}`);
      const response = await this.transport(url, { headers: this.headers, signal });
      const body = parseBody(await response.text());
      if (signal?.aborted) return cancelled(url);

      if (this.onResponse) {
        await this.onResponse({ category, target, url, status: response.status, body });
      }

      if (response.status !== 200) {
        return {
          ok: false,
          kind: classifyStatus(response.status),
          status: response.status,
          detail: buildErrorDetail(response.status, body, target, this.settings.apiVersion),
        };
      }

      if (!Array.isArray(body)) {
        return {
          ok: false,
          kind: 'Unknown',
          status: response.status,
          detail: `Expected a JSON array of alerts from ${url}`,
        };
      }

      count += body.length;
      alerts.push(...body.filter(isRecord));

      const next = this.paginate ? parseNextLink(response.headers.get('link')) : undefined;
      if (next !== undefined && visited.has(next)) {
        this.logger.warn(`[API] Stopping pagination: ${next} was already read`);
        break;
      }
      url = next;
    }

    this.logger.verbose(`[API] ${count} open ${category} alerts for ${describeTarget(target)}`);
    return { ok: true, alerts, count, malformed: count - alerts.length };
  }
}

/**
 * Creates the fetcher used by the CLI.
 */
export function createApiClient(settings: ApiSettings, options: AlertFetcherOptions = {}): AlertFetcher {
  return new AlertFetcher(settings, options);
}

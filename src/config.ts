// src/config.ts
// Configuration file format and loader.
//
// The file is parsed with the yaml package, so both config.json and config.yml work.
// The credential may come from the file or from GITHUB_TOKEN (see .env.example).

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors';

export const DEFAULT_API_URL = 'https://api.github.com';
export const DEFAULT_API_VERSION = '2022-11-28';

// ============================================================================
// INPUT FORMATS
// ============================================================================

const NameListSchema = z.array(z.string().nullable()).nullable().optional();

export const ProjectConfigSchema = z.object({
  organizations: NameListSchema,
  repositories: NameListSchema,
  owner: z.string().nullable().optional(),
});

export const ConnectionConfigSchema = z.object({
  gh_api_url: z.string().url().default(DEFAULT_API_URL),
  gh_api_key: z.string().nullable().optional(),
  gh_api_version: z.string().min(1).default(DEFAULT_API_VERSION),
});

export const ReporterConfigSchema = z.object({
  connection: ConnectionConfigSchema.default({}),
  projects: z.record(z.string(), ProjectConfigSchema),
});

// ProjectConfig is one entry under "projects": the organizations and repositories to query
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

// ApiSettings are the connection values threaded into the fetcher
export interface ApiSettings {
  baseUrl: string;
  token: string;
  apiVersion: string;
}

export interface NamedProject {
  name: string;
  config: ProjectConfig;
}

export interface ReporterConfig {
  api: ApiSettings;
  projects: NamedProject[];
}

// ============================================================================
// LOADING
// ============================================================================

/**
 * Validates an already-parsed configuration document.
 *
 * Projects with an empty name are dropped. `env` is consulted for GITHUB_TOKEN when
 * the document carries no credential.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env, source = 'config'): ReporterConfig {
  const parsed = ReporterConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration in ${source}: ${issues}`);
  }

  const { connection, projects } = parsed.data;
  const token = connection.gh_api_key || env.GITHUB_TOKEN;
  if (!token) {
    throw new ConfigError(
      `Missing API credential. Set connection.gh_api_key in ${source} or the GITHUB_TOKEN environment variable.`
    );
  }

  const named: NamedProject[] = [];
  for (const [name, config] of Object.entries(projects)) {
    if (name.trim() === '') continue;

    const hasRepositories = (config.repositories ?? []).some((repo) => repo !== null && repo.trim() !== '');
    if (hasRepositories && !config.owner?.trim()) {
      throw new ConfigError(`Project "${name}" lists repositories but has no owner in ${source}`);
    }
    named.push({ name, config });
  }

  return {
    api: {
      baseUrl: connection.gh_api_url,
      token,
      apiVersion: connection.gh_api_version,
    },
    projects: named,
  };
}

/**
 * Reads and validates the configuration file at `filePath`.
 */
export async function loadConfig(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<ReporterConfig> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${filePath}`);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = yaml.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Configuration file ${filePath} is not valid JSON or YAML: ${reason}`);
  }

  return parseConfig(raw, env, filePath);
}

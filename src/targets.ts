// src/targets.ts
// Expands a project's configuration into the list of targets to query.

import type { ProjectConfig } from './config';
import { ConfigError } from './errors';

export type TargetKind = 'organization' | 'repository';

export type Target =
  | { readonly kind: 'organization'; readonly name: string }
  | { readonly kind: 'repository'; readonly name: string; readonly owner: string };

/**
 * Human-readable label used in logs and diagnostics, e.g. `organization acme-corp`
 * or `repository acme-corp/ledger`.
 */
export function describeTarget(target: Target): string {
  return target.kind === 'organization'
    ? `organization ${target.name}`
    : `repository ${target.owner}/${target.name}`;
}

function presentNames(names: ReadonlyArray<string | null> | null | undefined): string[] {
  return (names ?? [])
    .filter((name): name is string => typeof name === 'string')
    .map((name) => name.trim())
    .filter((name) => name !== '');
}

/**
 * Organizations first, then repositories, each group in configured order.
 * Blank and null entries are skipped.
 */
export function resolveTargets(project: ProjectConfig): Target[] {
  const organizations: Target[] = presentNames(project.organizations).map((name) => ({
    kind: 'organization',
    name,
  }));

  const repositoryNames = presentNames(project.repositories);
  const owner = project.owner?.trim() ?? '';
  if (repositoryNames.length > 0 && owner === '') {
    throw new ConfigError(`Repositories ${repositoryNames.join(', ')} have no owner`);
  }

  const repositories: Target[] = repositoryNames.map((name) => ({
    kind: 'repository',
    name,
    owner,
  }));

  return [...organizations, ...repositories];
}

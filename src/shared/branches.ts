// Naming utilities for preview resources
// Working directory: {workRoot}/pr_preview-{encoded branch}
// Container:         container_{slug}_{pr}_{port}
// Image:             preview_{slug}_{pr}
// Compose project:   preview-{slug}-{pr}

import path from 'path';

const MAX_SLUG_LENGTH = 50;

/**
 * Identifies the preview of one pull request
 */
export interface ResourceKey {
  branchName: string;
  prNumber: number;
}

export type LogKind = 'deployment' | 'cleanup';

/**
 * Convert a branch name to a slug usable in docker names
 * - Convert to lowercase
 * - Replace slashes, spaces and underscores with hyphens
 * - Remove other special characters
 * - Truncate to MAX_SLUG_LENGTH
 */
export function slugify(branchName: string): string {
  const slug = branchName
    .toLowerCase()
    .replace(/[\s_/]+/g, '-')
    .replace(/[^a-z0-9.-]/g, '')
    .replace(/-+/g, '-')
    .replace(/^[-.]+|[-.]+$/g, '')
    .substring(0, MAX_SLUG_LENGTH);
  return slug || 'branch';
}

/**
 * Encode a branch name for use inside a single file name
 */
export function encodeBranch(branchName: string): string {
  return encodeURIComponent(branchName);
}

/**
 * Working directory of a branch; the same branch always maps to the same path
 */
export function getWorkingDirectory(workRoot: string, branchName: string): string {
  return path.join(workRoot, `pr_preview-${encodeBranch(branchName)}`);
}

export function getImageName(key: ResourceKey): string {
  return `preview_${slugify(key.branchName)}_${key.prNumber}`;
}

export function getContainerName(key: ResourceKey, port: number): string {
  return `container_${slugify(key.branchName)}_${key.prNumber}_${port}`;
}

export function getComposeProject(key: ResourceKey): string {
  return `preview-${slugify(key.branchName)}-${key.prNumber}`;
}

/**
 * Path of the run log artifact for one event
 */
export function getLogArtifactPath(logDir: string, kind: LogKind, key: ResourceKey): string {
  return path.join(logDir, `${kind}_log_${encodeBranch(key.branchName)}_${key.prNumber}.txt`);
}

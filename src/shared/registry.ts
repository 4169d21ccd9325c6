/**
 * Registry of deployed preview resources
 *
 * Records outlive the process so that cleanup can run in a different
 * invocation than the deploy that created them. A key may hold several
 * records when a branch was redeployed before an earlier cleanup ran;
 * the creation timestamp tells them apart.
 */

import fs from 'fs-extra';
import path from 'path';
import { encodeBranch, type ResourceKey } from './branches.js';
import { errorMessage } from './errors.js';
import { logger as rootLogger, type Logger } from './logger.js';

export interface DeployedResource {
  key: ResourceKey;
  // Container name, or compose project name when port is null
  resourceId: string;
  port: number | null;
  createdAt: Date;
}

export interface ContainerRegistry {
  record(resource: DeployedResource): Promise<void>;
  /**
   * Most recent record for the key
   */
  lookup(key: ResourceKey): Promise<DeployedResource | null>;
  /**
   * Every record for the key, oldest first
   */
  list(key: ResourceKey): Promise<DeployedResource[]>;
  /**
   * Remove one record (when createdAt is given) or every record of the key
   */
  remove(key: ResourceKey, createdAt?: Date): Promise<void>;
}

const RECORD_PATTERN = /^container_info_(.+)_(\d+)_(\d+)\.txt$/;

/**
 * Parse the `<resourceId> <port|->` body of a record file
 */
export function parseRecord(
  content: string
): Pick<DeployedResource, 'resourceId' | 'port'> | null {
  const [resourceId, rawPort, ...rest] = content.trim().split(/\s+/);
  if (!resourceId || !rawPort || rest.length > 0) return null;
  if (rawPort === '-') return { resourceId, port: null };

  const port = Number(rawPort);
  if (!Number.isInteger(port) || port < 1 || port > 65535) return null;
  return { resourceId, port };
}

export function serializeRecord(resource: Pick<DeployedResource, 'resourceId' | 'port'>): string {
  return `${resource.resourceId} ${resource.port ?? '-'}\n`;
}

/**
 * One text file per record in a flat directory
 */
export class FileContainerRegistry implements ContainerRegistry {
  private dir: string;
  private logger: Logger;

  constructor(dir: string, logger: Logger = rootLogger) {
    this.dir = dir;
    this.logger = logger;
  }

  private fileName(key: ResourceKey, createdAt: Date): string {
    return `container_info_${encodeBranch(key.branchName)}_${key.prNumber}_${createdAt.getTime()}.txt`;
  }

  async record(resource: DeployedResource): Promise<void> {
    const target = path.join(this.dir, this.fileName(resource.key, resource.createdAt));
    const temp = `${target}.${process.pid}.tmp`;
    try {
      await fs.outputFile(temp, serializeRecord(resource), 'utf-8');
      await fs.rename(temp, target);
    } catch (error) {
      throw new Error(
        `Failed to record ${resource.resourceId} for ${resource.key.branchName}#${resource.key.prNumber}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async lookup(key: ResourceKey): Promise<DeployedResource | null> {
    const records = await this.list(key);
    return records.length > 0 ? records[records.length - 1] : null;
  }

  async list(key: ResourceKey): Promise<DeployedResource[]> {
    if (!(await fs.pathExists(this.dir))) return [];

    const entries = await fs.readdir(this.dir);
    const records: DeployedResource[] = [];

    for (const entry of entries) {
      const match = RECORD_PATTERN.exec(entry);
      if (!match) continue;

      const [, encodedBranch, prNumber, timestamp] = match;
      if (encodedBranch !== encodeBranch(key.branchName) || Number(prNumber) !== key.prNumber) {
        continue;
      }

      let content: string;
      try {
        content = await fs.readFile(path.join(this.dir, entry), 'utf-8');
      } catch (error) {
        // Removed by a concurrent cleanup between readdir and read
        this.logger.warn({ err: error, entry }, 'Skipping unreadable registry record');
        continue;
      }

      const parsed = parseRecord(content);
      if (!parsed) {
        this.logger.warn({ entry }, 'Skipping malformed registry record');
        continue;
      }

      records.push({ key, ...parsed, createdAt: new Date(Number(timestamp)) });
    }

    return records.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async remove(key: ResourceKey, createdAt?: Date): Promise<void> {
    const targets = createdAt
      ? [createdAt]
      : (await this.list(key)).map(record => record.createdAt);

    for (const timestamp of targets) {
      await fs.remove(path.join(this.dir, this.fileName(key, timestamp)));
    }
  }
}

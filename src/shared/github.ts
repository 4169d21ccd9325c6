/**
 * Pull request notifications
 * Posts progress comments on the originating pull request
 */

import { getOctokit } from '@actions/github';
import type { Credential } from './auth.js';
import { NotificationError, errorMessage } from './errors.js';
import { logger as rootLogger, type Logger } from './logger.js';
import type { RunStep } from './run-log.js';

// Where notifications for an event are posted
export interface ReplyTarget {
  owner: string;
  repo: string;
  issueNumber: number;
}

// The slice of the Octokit client used for comments
export interface CommentClient {
  rest: {
    issues: {
      createComment(params: {
        owner: string;
        repo: string;
        issue_number: number;
        body: string;
      }): Promise<{ status: number; data: { html_url: string } }>;
    };
  };
}

export interface Notifier {
  post(credential: Credential, target: ReplyTarget, message: string, steps?: RunStep[]): Promise<boolean>;
}

const MAX_DETAIL_LENGTH = 500;

function escapeCell(value: string): string {
  const cell = value
    .trim()
    .replace(/\|/g, '\\|')
    .replace(/\r?\n/g, '<br>');
  return cell.length > MAX_DETAIL_LENGTH ? `${cell.substring(0, MAX_DETAIL_LENGTH)}…` : cell;
}

/**
 * Render steps as a markdown table
 */
export function formatStepTable(steps: RunStep[]): string {
  let table = '| Step | Status | Details |\n|------|--------|---------|\n';
  for (const step of steps) {
    table += `| ${escapeCell(step.name)} | ${step.status} | ${escapeCell(step.message)} |\n`;
  }
  return table;
}

export function formatComment(message: string, steps?: RunStep[]): string {
  if (!steps || steps.length === 0) return message;
  return `${message}\n\n${formatStepTable(steps)}`;
}

export interface NotificationServiceOptions {
  baseUrl?: string;
  createClient?: (token: string) => CommentClient;
  logger?: Logger;
}

/**
 * Comment poster; failures are logged and reported as `false`, never thrown
 */
export class NotificationService implements Notifier {
  private createClient: (token: string) => CommentClient;
  private logger: Logger;

  constructor(options: NotificationServiceOptions = {}) {
    this.createClient =
      options.createClient ?? (token => getOctokit(token, { baseUrl: options.baseUrl }));
    this.logger = options.logger ?? rootLogger;
  }

  async post(
    credential: Credential,
    target: ReplyTarget,
    message: string,
    steps?: RunStep[]
  ): Promise<boolean> {
    try {
      const { data } = await this.createClient(credential.token).rest.issues.createComment({
        owner: target.owner,
        repo: target.repo,
        issue_number: target.issueNumber,
        body: formatComment(message, steps)
      });
      this.logger.debug({ url: data.html_url }, 'Posted pull request comment');
      return true;
    } catch (error) {
      const failure = new NotificationError(
        `Failed to comment on ${target.owner}/${target.repo}#${target.issueNumber}: ${errorMessage(error)}`,
        { cause: error }
      );
      this.logger.error({ err: failure }, failure.message);
      return false;
    }
  }
}

/**
 * Webhook event dispatcher
 *
 * Turns one signed pull_request delivery into a deploy or cleanup:
 *   received -> verified -> routed -> deploying | cleaning_up | noop -> notified -> done
 *
 * Nothing is kept between deliveries apart from the container registry the
 * runner writes to. Failures are never retried here; GitHub redelivery is
 * the only retry path.
 */

import type { Credential, CredentialMinter } from '../shared/auth.js';
import { getLogArtifactPath, type LogKind } from '../shared/branches.js';
import { VerificationError } from '../shared/errors.js';
import type { Notifier } from '../shared/github.js';
import { logger as rootLogger, type Logger } from '../shared/logger.js';
import type { LogSender } from '../shared/mailer.js';
import type { RunLog } from '../shared/run-log.js';
import type { ActionRunner, CommandOutcome } from '../shared/runner.js';
import { parseLifecycleEvent, verifySignature, type LifecycleEvent } from './events.js';

export type DispatchStatus = 200 | 400 | 401 | 500;

export interface DispatchResult {
  status: DispatchStatus;
  body: { message: string };
}

export interface LogDelivery {
  sender: LogSender;
  recipient: string;
}

export interface EventDispatcherOptions {
  webhookSecret: string;
  logDir: string;
  auth: CredentialMinter;
  notifier: Notifier;
  runner: ActionRunner;
  // Mail delivery of run logs; skipped when null
  mail?: LogDelivery | null;
  logger?: Logger;
}

// Deploy and cleanup differ only in these messages and the action they run
interface ActionPlan {
  kind: LogKind;
  stage: 'deploying' | 'cleaning_up';
  started: string;
  failure: string;
  processed: string;
  failed: string;
  subject: string;
  mailBody: string;
  run(): Promise<CommandOutcome>;
  outcomeMessage(outcome: CommandOutcome): string;
}

export const MESSAGES = {
  deployStarted: 'Deployment started for this pull request.',
  deployFailed: 'Deployment failed. Please check the logs.',
  cleanupStarted: 'Cleanup started for this pull request.',
  cleanupCompleted: 'Cleanup completed for this pull request.',
  cleanupFailed: 'Cleanup failed. Please check the logs.'
} as const;

// Decoded only after verification; a UTF-8 byte order mark is not part of the JSON
function decodeBody(rawBody: Buffer | string): string {
  const text = typeof rawBody === 'string' ? rawBody : rawBody.toString('utf-8');
  return text.replace(/^\uFEFF/, '');
}

function respond(status: DispatchStatus, message: string): DispatchResult {
  return { status, body: { message } };
}

/**
 * Outcome comment for a deployment
 */
export function deploymentMessage(outcome: CommandOutcome): string {
  if (!outcome.succeeded) return MESSAGES.deployFailed;

  const { deploymentURL, serviceURLs } = outcome.extractedFields;
  const services = Object.entries(serviceURLs ?? {});
  if (services.length > 0) {
    const links = services.map(([service, url]) => `[${service}](${url})`).join(', ');
    return `Deployment successful. Services: ${links}.`;
  }
  if (deploymentURL) {
    return `Deployment successful. [Deployed application](${deploymentURL}).`;
  }
  return 'Deployment successful.';
}

export function cleanupMessage(outcome: CommandOutcome): string {
  return outcome.succeeded ? MESSAGES.cleanupCompleted : MESSAGES.cleanupFailed;
}

export class EventDispatcher {
  private webhookSecret: string;
  private logDir: string;
  private auth: CredentialMinter;
  private notifier: Notifier;
  private runner: ActionRunner;
  private mail: LogDelivery | null;
  private logger: Logger;

  constructor(options: EventDispatcherOptions) {
    this.webhookSecret = options.webhookSecret;
    this.logDir = options.logDir;
    this.auth = options.auth;
    this.notifier = options.notifier;
    this.runner = options.runner;
    this.mail = options.mail ?? null;
    this.logger = options.logger ?? rootLogger;
  }

  /**
   * Handle one webhook delivery
   * @param rawBody - Request body exactly as received
   * @param signature - Value of the X-Hub-Signature-256 header
   * @param deliveryId - Value of the X-GitHub-Delivery header, for log correlation
   */
  async handle(rawBody: Buffer | string, signature: string | undefined, deliveryId?: string): Promise<DispatchResult> {
    const log = this.logger.child({ delivery: deliveryId ?? 'unknown' });
    log.debug({ stage: 'received' }, 'Webhook received');

    // Verified before anything looks at the body
    if (!verifySignature(this.webhookSecret, rawBody, signature)) {
      const error = new VerificationError(signature ? 'Signature mismatch' : 'Missing signature');
      log.warn({ err: error }, 'Rejected webhook');
      return respond(401, 'Invalid signature');
    }
    log.debug({ stage: 'verified' }, 'Signature verified');

    let payload: unknown;
    try {
      payload = JSON.parse(decodeBody(rawBody));
    } catch (error) {
      log.warn({ err: error }, 'Webhook body is not JSON');
      return respond(400, 'Invalid payload');
    }

    const event = parseLifecycleEvent(payload);
    if (!event) {
      log.info({ stage: 'noop' }, 'No pull request in payload');
      return respond(200, 'No action taken');
    }

    const eventLog = log.child({ branch: event.branchName, pr: event.prNumber, action: event.action });
    const plan = this.planFor(event);
    if (!plan) {
      eventLog.info({ stage: 'noop' }, 'Nothing to do for this action');
      return respond(200, 'No action taken');
    }

    eventLog.info({ stage: 'routed', kind: plan.kind }, 'Event routed');
    return this.process(event, plan, eventLog);
  }

  private planFor(event: LifecycleEvent): ActionPlan | null {
    switch (event.action) {
      case 'opened':
      case 'synchronize':
      case 'reopened': {
        const repoURL = event.repoURL;
        if (!repoURL) return null;
        return {
          kind: 'deployment',
          stage: 'deploying',
          started: MESSAGES.deployStarted,
          failure: MESSAGES.deployFailed,
          processed: 'Deployment processed',
          failed: 'Deployment failed',
          subject: 'Deployment Log',
          mailBody: 'Please find the attached deployment log.',
          run: () => this.runner.runDeploy(event.branchName, event.prNumber, repoURL),
          outcomeMessage: deploymentMessage
        };
      }
      case 'closed':
        // Merged or not, a closed pull request loses its preview
        return {
          kind: 'cleanup',
          stage: 'cleaning_up',
          started: MESSAGES.cleanupStarted,
          failure: MESSAGES.cleanupFailed,
          processed: 'Cleanup processed',
          failed: 'Cleanup failed',
          subject: 'Cleanup Log',
          mailBody: 'Please find the attached cleanup log.',
          run: () => this.runner.runCleanup(event.branchName, event.prNumber),
          outcomeMessage: cleanupMessage
        };
      default:
        return null;
    }
  }

  private async process(event: LifecycleEvent, plan: ActionPlan, log: Logger): Promise<DispatchResult> {
    let credential: Credential | null = null;

    try {
      credential = await this.auth.mint(event.installationId);
      await this.notifier.post(credential, event.replyTarget, plan.started);

      log.info({ stage: plan.stage }, `Running ${plan.kind}`);
      const outcome = await plan.run();

      await this.notifier.post(credential, event.replyTarget, plan.outcomeMessage(outcome), outcome.log.steps);
      log.info({ stage: 'notified', succeeded: outcome.succeeded }, `${plan.kind} finished`);

      await this.deliverLog(plan, event, outcome.log, log);
      log.info({ stage: 'done' }, 'Webhook processed');

      return outcome.succeeded ? respond(200, plan.processed) : respond(500, plan.failed);
    } catch (error) {
      log.error({ err: error }, `${plan.kind} failed`);
      if (credential) {
        await this.notifier.post(credential, event.replyTarget, plan.failure);
      }
      return respond(500, plan.failed);
    }
  }

  /**
   * Write the run log artifact and mail it; never fails the event
   */
  private async deliverLog(plan: ActionPlan, event: LifecycleEvent, runLog: RunLog, log: Logger): Promise<void> {
    let artifact: string;
    try {
      artifact = await runLog.save(getLogArtifactPath(this.logDir, plan.kind, event));
    } catch (error) {
      log.error({ err: error }, 'Failed to write run log');
      return;
    }

    if (!this.mail) {
      log.debug({ artifact }, 'Mail not configured, run log kept on disk only');
      return;
    }

    const sent = await this.mail.sender.send(this.mail.recipient, plan.subject, plan.mailBody, artifact);
    if (!sent) {
      log.warn({ artifact }, 'Run log was not mailed');
    }
  }
}

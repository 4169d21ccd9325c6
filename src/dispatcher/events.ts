/**
 * Webhook payload verification and parsing
 */

import { createHmac, timingSafeEqual } from 'crypto';
import { z } from 'zod';
import type { ReplyTarget } from '../shared/github.js';

export type LifecycleAction = 'opened' | 'synchronize' | 'reopened' | 'closed' | 'other';

export interface LifecycleEvent {
  readonly action: LifecycleAction;
  readonly branchName: string;
  readonly prNumber: number;
  // null when the head repository has been deleted
  readonly repoURL: string | null;
  readonly installationId: number;
  readonly replyTarget: Readonly<ReplyTarget>;
}

const SIGNATURE_PREFIX = 'sha256=';

const KNOWN_ACTIONS: readonly LifecycleAction[] = ['opened', 'synchronize', 'reopened', 'closed'];

const PullRequestEventSchema = z.object({
  action: z.string(),
  pull_request: z.object({
    number: z.number().int().positive(),
    head: z.object({
      ref: z.string().min(1),
      repo: z.object({ clone_url: z.string().min(1) }).nullable()
    })
  }),
  repository: z.object({
    full_name: z.string().regex(/^[^/]+\/[^/]+$/)
  }),
  installation: z.object({
    id: z.number().int()
  })
});

/**
 * Compute the `sha256=<hex>` signature GitHub sends for a body
 */
export function signPayload(secret: string, rawBody: string | Buffer): string {
  return SIGNATURE_PREFIX + createHmac('sha256', secret).update(rawBody).digest('hex');
}

/**
 * Constant-time check of the X-Hub-Signature-256 header against the raw body
 */
export function verifySignature(
  secret: string,
  rawBody: string | Buffer,
  signature: string | null | undefined
): boolean {
  if (!signature || !signature.startsWith(SIGNATURE_PREFIX)) return false;

  const expected = Buffer.from(signPayload(secret, rawBody));
  const received = Buffer.from(signature);
  if (expected.length !== received.length) return false;
  return timingSafeEqual(expected, received);
}

function toAction(action: string): LifecycleAction {
  return KNOWN_ACTIONS.find(known => known === action) ?? 'other';
}

/**
 * Build a LifecycleEvent from a verified, JSON-parsed payload
 * @returns null when the payload carries no usable pull request
 */
export function parseLifecycleEvent(payload: unknown): LifecycleEvent | null {
  const parsed = PullRequestEventSchema.safeParse(payload);
  if (!parsed.success) return null;

  const { action, pull_request: pr, repository, installation } = parsed.data;
  const [owner, repo] = repository.full_name.split('/');

  return Object.freeze({
    action: toAction(action),
    branchName: pr.head.ref,
    prNumber: pr.number,
    repoURL: pr.head.repo?.clone_url ?? null,
    installationId: installation.id,
    replyTarget: Object.freeze({ owner, repo, issueNumber: pr.number })
  });
}

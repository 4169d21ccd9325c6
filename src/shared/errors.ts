/**
 * Error taxonomy for webhook processing
 *
 * Only AuthError and unexpected errors end a delivery with a 5xx.
 * ActionFailure, NotificationError and MailError are logged and folded
 * into the outcome that is reported back to the pull request.
 */

import type { ShellResult } from './shell.js';

/**
 * Credential could not be minted (unreadable key, failed token exchange)
 */
export class AuthError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthError';
  }
}

/**
 * Webhook signature missing or not matching the payload
 */
export class VerificationError extends Error {
  constructor(message = 'Invalid signature') {
    super(message);
    this.name = 'VerificationError';
  }
}

/**
 * A deploy or cleanup step failed: a command exited non-zero, or the step
 * could not run at all (no free port)
 */
export class ActionFailure extends Error {
  readonly step: string;
  // null when no command was run
  readonly exitCode: number | null;

  constructor(step: string, reason: ShellResult | string) {
    super(
      typeof reason === 'string'
        ? `${step} failed: ${reason}`
        : `${step} failed with exit code ${reason.exitCode}`
    );
    this.name = 'ActionFailure';
    this.step = step;
    this.exitCode = typeof reason === 'string' ? null : reason.exitCode;
  }
}

/**
 * Every probed host port in the range was taken
 */
export class PortAllocationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PortAllocationError';
  }
}

export class NotificationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotificationError';
  }
}

export class MailError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MailError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Process-wide configuration
 *
 * Read once at start-up from the environment and passed to every component;
 * nothing re-reads the environment while a request is being handled.
 */

import os from 'os';
import path from 'path';
import type { KeyObject } from 'crypto';
import { z } from 'zod';
import { loadPrivateKey } from './auth.js';
import type { RetryPolicy, SmtpSettings } from './mailer.js';
import type { PortRange } from './ports.js';

const stateRoot = path.join(os.tmpdir(), 'pr-preview-bot');

const EnvSchema = z
  .object({
    WEBHOOK_SECRET: z.string().min(1),
    APP_ID: z.string().min(1),
    PRIVATE_KEY_PATH: z.string().min(1),
    GITHUB_API_URL: z.string().url().default('https://api.github.com'),

    PORT: z.coerce.number().int().min(1).max(65535).default(5000),
    PUBLIC_HOST: z.string().min(1).default('localhost'),

    WORK_ROOT: z.string().min(1).default(os.tmpdir()),
    REGISTRY_DIR: z.string().min(1).default(path.join(stateRoot, 'registry')),
    LOG_DIR: z.string().min(1).default(path.join(stateRoot, 'logs')),

    PORT_RANGE_MIN: z.coerce.number().int().min(1).max(65535).default(4000),
    PORT_RANGE_MAX: z.coerce.number().int().min(1).max(65535).default(7000),
    CONTAINER_PORT: z.coerce.number().int().min(1).max(65535).default(80),

    SMTP_SERVER: z.string().min(1).optional(),
    SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(587),
    SMTP_USERNAME: z.string().min(1).optional(),
    SMTP_PASSWORD: z.string().optional(),
    RECIPIENT_EMAIL: z.string().email().optional(),
    MAIL_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    MAIL_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(5000)
  })
  .refine(env => env.PORT_RANGE_MIN <= env.PORT_RANGE_MAX, {
    message: 'PORT_RANGE_MIN must not exceed PORT_RANGE_MAX',
    path: ['PORT_RANGE_MIN']
  });

export type Env = z.infer<typeof EnvSchema>;

export interface MailConfig {
  smtp: SmtpSettings;
  recipient: string;
  policy: RetryPolicy;
}

export interface BotConfig {
  webhookSecret: string;
  appId: string;
  privateKey: KeyObject;
  githubApiUrl: string;
  port: number;
  publicHost: string;
  workRoot: string;
  registryDir: string;
  logDir: string;
  portRange: PortRange;
  containerPort: number;
  // null when SMTP or the recipient is not configured
  mail: MailConfig | null;
}

/**
 * Validate environment variables
 * @throws Error listing every invalid variable
 */
export function parseEnv(processEnv: NodeJS.ProcessEnv): Env {
  // Treat empty strings as unset so optional variables in .env can be left blank
  const cleaned = Object.fromEntries(
    Object.entries(processEnv).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const msg = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid environment variables:\n${msg}`);
  }
  return parsed.data;
}

export function mailConfigFrom(env: Env): MailConfig | null {
  if (!env.SMTP_SERVER || !env.SMTP_USERNAME || !env.RECIPIENT_EMAIL) {
    return null;
  }
  return {
    smtp: {
      host: env.SMTP_SERVER,
      port: env.SMTP_PORT,
      username: env.SMTP_USERNAME,
      password: env.SMTP_PASSWORD ?? ''
    },
    recipient: env.RECIPIENT_EMAIL,
    policy: { maxAttempts: env.MAIL_MAX_ATTEMPTS, delayMs: env.MAIL_RETRY_DELAY_MS }
  };
}

/**
 * Build the configuration and load the signing key
 * @throws AuthError if the private key cannot be loaded
 */
export async function loadConfig(processEnv: NodeJS.ProcessEnv): Promise<Readonly<BotConfig>> {
  const env = parseEnv(processEnv);
  const privateKey = await loadPrivateKey(env.PRIVATE_KEY_PATH);

  return Object.freeze({
    webhookSecret: env.WEBHOOK_SECRET,
    appId: env.APP_ID,
    privateKey,
    githubApiUrl: env.GITHUB_API_URL,
    port: env.PORT,
    publicHost: env.PUBLIC_HOST,
    workRoot: env.WORK_ROOT,
    registryDir: env.REGISTRY_DIR,
    logDir: env.LOG_DIR,
    portRange: { min: env.PORT_RANGE_MIN, max: env.PORT_RANGE_MAX },
    containerPort: env.CONTAINER_PORT,
    mail: mailConfigFrom(env)
  });
}

#!/usr/bin/env node
/**
 * Server entry point
 *
 * Loads configuration once, wires the components and serves the webhook
 * endpoint through @hono/node-server.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { EventDispatcher } from './dispatcher/index.js';
import { AuthTokenProvider } from './shared/auth.js';
import { loadConfig } from './shared/config.js';
import { NotificationService } from './shared/github.js';
import { logger } from './shared/logger.js';
import { LogDispatcher, createSmtpTransport } from './shared/mailer.js';
import { PortAllocator } from './shared/ports.js';
import { FileContainerRegistry } from './shared/registry.js';
import { CommandRunner } from './shared/runner.js';

async function main(): Promise<void> {
  const config = await loadConfig(process.env);

  const runner = new CommandRunner({
    registry: new FileContainerRegistry(config.registryDir),
    workRoot: config.workRoot,
    publicHost: config.publicHost,
    containerPort: config.containerPort,
    ports: new PortAllocator(config.portRange)
  });

  const mail = config.mail
    ? {
        sender: new LogDispatcher({
          transport: createSmtpTransport(config.mail.smtp),
          from: config.mail.smtp.username,
          policy: config.mail.policy
        }),
        recipient: config.mail.recipient
      }
    : null;
  if (!mail) {
    logger.warn('SMTP or RECIPIENT_EMAIL not configured, run logs will not be mailed');
  }

  const dispatcher = new EventDispatcher({
    webhookSecret: config.webhookSecret,
    logDir: config.logDir,
    auth: new AuthTokenProvider({
      appId: config.appId,
      privateKey: config.privateKey,
      baseUrl: config.githubApiUrl
    }),
    notifier: new NotificationService({ baseUrl: config.githubApiUrl }),
    runner,
    mail
  });

  const server = serve({ fetch: createApp({ dispatcher }).fetch, port: config.port }, info => {
    logger.info({ port: info.port, registry: config.registryDir }, 'Preview bot listening');
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');
    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(error => {
  logger.fatal({ err: error }, 'Preview bot failed to start');
  process.exit(1);
});

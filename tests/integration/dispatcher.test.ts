/**
 * Integration tests for webhook dispatch
 *
 * Signed deliveries go through EventDispatcher with mocked GitHub, mail and
 * runner collaborators, plus one suite against the real runner and registry.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import { dir as tmpDir } from 'tmp-promise';
import {
  EventDispatcher,
  MESSAGES,
  deploymentMessage,
  type EventDispatcherOptions
} from '../../src/dispatcher/index.js';
import { signPayload } from '../../src/dispatcher/events.js';
import { AuthError } from '../../src/shared/errors.js';
import { PortAllocator } from '../../src/shared/ports.js';
import { FileContainerRegistry } from '../../src/shared/registry.js';
import { CommandRunner } from '../../src/shared/runner.js';
import {
  createFakeShell,
  createMockAuth,
  createMockMailer,
  createMockNotifier,
  createMockRunner,
  createOutcome,
  randomForPorts
} from './mocks.js';

const SECRET = 'test-secret';
const REPLY_TARGET = { owner: 'octo', repo: 'preview', issueNumber: 42 };

function prPayload(action: string, headRepo: { clone_url: string } | null = { clone_url: 'https://example/repo.git' }) {
  return {
    action,
    pull_request: {
      number: 42,
      head: { ref: 'feat-x', repo: headRepo }
    },
    repository: { full_name: 'octo/preview' },
    installation: { id: 99 }
  };
}

function signed(payload: unknown): [string, string] {
  const body = JSON.stringify(payload);
  return [body, signPayload(SECRET, body)];
}

describe('EventDispatcher', () => {
  let tmp: Awaited<ReturnType<typeof tmpDir>>;
  let logDir: string;

  beforeEach(async () => {
    tmp = await tmpDir({ unsafeCleanup: true });
    logDir = path.join(tmp.path, 'logs');
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  function setup(overrides: Partial<EventDispatcherOptions> = {}) {
    const auth = createMockAuth();
    const notifier = createMockNotifier();
    const mailer = createMockMailer();
    const runner = createMockRunner(
      createOutcome(
        true,
        { containerName: 'container_feat-x_42_5310', port: 5310, deploymentURL: 'http://1.2.3.4:5310' },
        [['Run Docker container', 'Success', 'Container container_feat-x_42_5310 running.']]
      ),
      createOutcome(true, {}, [['Cleanup', 'Success', 'No deployed resources found for branch feat-x with PR 42.']])
    );
    const dispatcher = new EventDispatcher({
      webhookSecret: SECRET,
      logDir,
      auth: auth.auth,
      notifier: notifier.notifier,
      runner: runner.runner,
      mail: { sender: mailer.sender, recipient: 'ops@example.com' },
      ...overrides
    });
    return { dispatcher, auth, notifier, mailer, runner };
  }

  describe('deployments', () => {
    it('should deploy an opened pull request and report the URL', async () => {
      const { dispatcher, auth, notifier, runner } = setup();

      const result = await dispatcher.handle(...signed(prPayload('opened')), 'delivery-1');

      expect(result).toEqual({ status: 200, body: { message: 'Deployment processed' } });
      expect(auth.mint).toHaveBeenCalledWith(99);
      expect(runner.runDeploy).toHaveBeenCalledWith('feat-x', 42, 'https://example/repo.git');
      expect(runner.runCleanup).not.toHaveBeenCalled();

      expect(notifier.post).toHaveBeenCalledTimes(2);
      const [firstCredential, firstTarget, firstMessage] = notifier.post.mock.calls[0];
      expect(firstCredential.token).toBe('test-token');
      expect(firstTarget).toEqual(REPLY_TARGET);
      expect(firstMessage).toBe('Deployment started for this pull request.');

      const [, , secondMessage, steps] = notifier.post.mock.calls[1];
      expect(secondMessage).toBe('Deployment successful. [Deployed application](http://1.2.3.4:5310).');
      expect(steps).toEqual([
        { name: 'Run Docker container', status: 'Success', message: 'Container container_feat-x_42_5310 running.' }
      ]);
    });

    it.each(['synchronize', 'reopened'])('should redeploy on %s', async action => {
      const { dispatcher, runner } = setup();

      const result = await dispatcher.handle(...signed(prPayload(action)));

      expect(result.status).toBe(200);
      expect(runner.runDeploy).toHaveBeenCalledTimes(1);
    });

    it('should write the run log and mail it', async () => {
      const { dispatcher, mailer } = setup();
      const artifact = path.join(logDir, 'deployment_log_feat-x_42.txt');

      await dispatcher.handle(...signed(prPayload('opened')));

      expect(mailer.send).toHaveBeenCalledWith(
        'ops@example.com',
        'Deployment Log',
        'Please find the attached deployment log.',
        artifact
      );
      const content = await fs.readFile(artifact, 'utf-8');
      expect(content.split('\n')[0]).toBe(
        '[Success] Run Docker container: Container container_feat-x_42_5310 running.'
      );
    });

    it('should report a failed deployment with a 500 and still mail the log', async () => {
      const failed = createOutcome(false, {}, [['Build Docker image', 'Failed', 'build exploded']]);
      const { dispatcher, notifier, mailer } = setup({ runner: createMockRunner(failed).runner });

      const result = await dispatcher.handle(...signed(prPayload('opened')));

      expect(result).toEqual({ status: 500, body: { message: 'Deployment failed' } });
      expect(notifier.post.mock.calls.map(call => call[2])).toEqual([
        'Deployment started for this pull request.',
        'Deployment failed. Please check the logs.'
      ]);
      expect(mailer.send).toHaveBeenCalledTimes(1);
    });

    it('should post the failure message once when the runner throws', async () => {
      const runner = createMockRunner();
      runner.runDeploy.mockRejectedValue(new Error('disk full'));
      const { dispatcher, notifier, mailer } = setup({ runner: runner.runner });

      const result = await dispatcher.handle(...signed(prPayload('opened')));

      expect(result).toEqual({ status: 500, body: { message: 'Deployment failed' } });
      expect(notifier.post.mock.calls.map(call => call[2])).toEqual([
        MESSAGES.deployStarted,
        MESSAGES.deployFailed
      ]);
      expect(mailer.send).not.toHaveBeenCalled();
    });

    it('should not comment when no credential could be minted', async () => {
      const auth = createMockAuth();
      auth.mint.mockRejectedValue(new AuthError('Failed to get access token for installation 99: Bad credentials'));
      const { dispatcher, notifier, runner } = setup({ auth: auth.auth });

      const result = await dispatcher.handle(...signed(prPayload('opened')));

      expect(result).toEqual({ status: 500, body: { message: 'Deployment failed' } });
      expect(notifier.post).not.toHaveBeenCalled();
      expect(runner.runDeploy).not.toHaveBeenCalled();
    });

    it('should keep the artifact on disk when mail is not configured', async () => {
      const { dispatcher } = setup({ mail: null });

      const result = await dispatcher.handle(...signed(prPayload('opened')));

      expect(result.status).toBe(200);
      expect(await fs.pathExists(path.join(logDir, 'deployment_log_feat-x_42.txt'))).toBe(true);
    });

    it('should ignore an opened event whose head repository is gone', async () => {
      const { dispatcher, auth, runner } = setup();

      const result = await dispatcher.handle(...signed(prPayload('opened', null)));

      expect(result).toEqual({ status: 200, body: { message: 'No action taken' } });
      expect(auth.mint).not.toHaveBeenCalled();
      expect(runner.runDeploy).not.toHaveBeenCalled();
    });
  });

  describe('cleanups', () => {
    it('should clean up a closed pull request', async () => {
      const { dispatcher, notifier, mailer, runner } = setup();

      const result = await dispatcher.handle(...signed(prPayload('closed')));

      expect(result).toEqual({ status: 200, body: { message: 'Cleanup processed' } });
      expect(runner.runCleanup).toHaveBeenCalledWith('feat-x', 42);
      expect(notifier.post.mock.calls.map(call => call[2])).toEqual([
        'Cleanup started for this pull request.',
        'Cleanup completed for this pull request.'
      ]);
      expect(mailer.send).toHaveBeenCalledWith(
        'ops@example.com',
        'Cleanup Log',
        'Please find the attached cleanup log.',
        path.join(logDir, 'cleanup_log_feat-x_42.txt')
      );
    });

    it('should clean up a closed pull request even without a head repository', async () => {
      const { dispatcher, runner } = setup();

      const result = await dispatcher.handle(...signed(prPayload('closed', null)));

      expect(result.status).toBe(200);
      expect(runner.runCleanup).toHaveBeenCalledWith('feat-x', 42);
    });
  });

  describe('rejected and ignored deliveries', () => {
    it('should reject a bad signature before doing anything', async () => {
      const { dispatcher, auth, notifier, runner, mailer } = setup();
      const body = JSON.stringify(prPayload('opened'));

      const result = await dispatcher.handle(body, signPayload('other-secret', body));

      expect(result).toEqual({ status: 401, body: { message: 'Invalid signature' } });
      expect(auth.mint).not.toHaveBeenCalled();
      expect(notifier.post).not.toHaveBeenCalled();
      expect(runner.runDeploy).not.toHaveBeenCalled();
      expect(mailer.send).not.toHaveBeenCalled();
    });

    it('should reject a missing signature', async () => {
      const { dispatcher } = setup();

      const result = await dispatcher.handle(JSON.stringify(prPayload('opened')), undefined);

      expect(result.status).toBe(401);
    });

    it('should reject a signed body that is not JSON', async () => {
      const { dispatcher, auth } = setup();

      const result = await dispatcher.handle('not json', signPayload(SECRET, 'not json'));

      expect(result).toEqual({ status: 400, body: { message: 'Invalid payload' } });
      expect(auth.mint).not.toHaveBeenCalled();
    });

    it('should take no action for payloads without a pull request', async () => {
      const { dispatcher, auth } = setup();

      const result = await dispatcher.handle(...signed({ zen: 'Keep it logically awesome.', hook_id: 1 }));

      expect(result).toEqual({ status: 200, body: { message: 'No action taken' } });
      expect(auth.mint).not.toHaveBeenCalled();
    });

    it.each(['labeled', 'edited', 'assigned'])('should take no action for %s', async action => {
      const { dispatcher, auth, runner } = setup();

      const result = await dispatcher.handle(...signed(prPayload(action)));

      expect(result).toEqual({ status: 200, body: { message: 'No action taken' } });
      expect(auth.mint).not.toHaveBeenCalled();
      expect(runner.runDeploy).not.toHaveBeenCalled();
      expect(runner.runCleanup).not.toHaveBeenCalled();
    });
  });

  describe('with the command runner', () => {
    it('should complete cleanup of a pull request that was never deployed, twice', async () => {
      const registry = new FileContainerRegistry(path.join(tmp.path, 'registry'));
      const { shell, calls } = createFakeShell();
      const runner = new CommandRunner({
        registry,
        workRoot: path.join(tmp.path, 'work'),
        publicHost: '1.2.3.4',
        ports: new PortAllocator({ min: 4000, max: 7000 }, async () => true, randomForPorts([5310])),
        shell
      });
      const { dispatcher, notifier } = setup({ runner });

      const first = await dispatcher.handle(...signed(prPayload('closed')));
      const second = await dispatcher.handle(...signed(prPayload('closed')));

      expect(first.status).toBe(200);
      expect(second.status).toBe(200);
      expect(notifier.post.mock.calls.map(call => call[2])).toEqual([
        MESSAGES.cleanupStarted,
        MESSAGES.cleanupCompleted,
        MESSAGES.cleanupStarted,
        MESSAGES.cleanupCompleted
      ]);
      expect(calls).toHaveLength(0);
      expect(await registry.list({ branchName: 'feat-x', prNumber: 42 })).toEqual([]);
    });

    it('should deploy then clean up through real command sequencing', async () => {
      const registry = new FileContainerRegistry(path.join(tmp.path, 'registry'));
      const { shell } = createFakeShell(async call => {
        if (call.file === 'git') {
          await fs.outputFile(path.join(call.args[call.args.length - 1], 'Dockerfile'), 'FROM nginx\n');
        }
        return undefined;
      });
      const runner = new CommandRunner({
        registry,
        workRoot: path.join(tmp.path, 'work'),
        publicHost: '1.2.3.4',
        ports: new PortAllocator({ min: 4000, max: 7000 }, async () => true, randomForPorts([5310])),
        shell
      });
      const { dispatcher, notifier } = setup({ runner });

      await dispatcher.handle(...signed(prPayload('opened')));
      expect(notifier.post.mock.calls[1][2]).toBe(
        'Deployment successful. [Deployed application](http://1.2.3.4:5310).'
      );
      expect(await registry.lookup({ branchName: 'feat-x', prNumber: 42 })).toMatchObject({
        resourceId: 'container_feat-x_42_5310',
        port: 5310
      });

      await dispatcher.handle(...signed(prPayload('closed')));
      expect(notifier.post.mock.calls[3][2]).toBe(MESSAGES.cleanupCompleted);
      expect(await registry.list({ branchName: 'feat-x', prNumber: 42 })).toEqual([]);
    });
  });
});

describe('deploymentMessage', () => {
  it('should list every service URL for compose deployments', () => {
    const outcome = createOutcome(true, {
      deploymentURL: 'http://h:1',
      serviceURLs: { web: 'http://h:1', api: 'http://h:2' }
    });

    expect(deploymentMessage(outcome)).toBe('Deployment successful. Services: [web](http://h:1), [api](http://h:2).');
  });

  it('should fall back to a plain success message without URLs', () => {
    expect(deploymentMessage(createOutcome(true, { serviceURLs: {} }))).toBe('Deployment successful.');
  });

  it('should use the failure message for failed outcomes', () => {
    expect(deploymentMessage(createOutcome(false, { deploymentURL: 'http://h:1' }))).toBe(MESSAGES.deployFailed);
  });
});

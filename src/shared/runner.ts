/**
 * Deploy and cleanup actions for pull request previews
 *
 * A non-zero exit of any command ends the action and is reported through
 * the returned CommandOutcome; only unexpected errors (filesystem, registry)
 * are thrown. Work on one branch is serialized because the working
 * directory is derived from the branch name alone.
 */

import fs from 'fs-extra';
import path from 'path';
import {
  getComposeProject,
  getContainerName,
  getImageName,
  getWorkingDirectory,
  type ResourceKey
} from './branches.js';
import {
  COMPOSE_FILES,
  DockerOperations,
  isMissingContainer,
  isPortConflict,
  parsePublishedPort
} from './docker.js';
import { ActionFailure, PortAllocationError } from './errors.js';
import { GitOperations } from './git.js';
import { KeyedMutex } from './lock.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { PortAllocator } from './ports.js';
import type { ContainerRegistry, DeployedResource } from './registry.js';
import { RunLog } from './run-log.js';
import { execaShell, type Shell, type ShellResult } from './shell.js';

export interface ExtractedFields {
  containerName?: string;
  port?: number;
  deploymentURL?: string;
  // Compose stacks: service name -> published host port / URL
  servicePorts?: Record<string, number>;
  serviceURLs?: Record<string, string>;
}

export interface CommandOutcome {
  succeeded: boolean;
  stdout: string;
  stderr: string;
  extractedFields: ExtractedFields;
  log: RunLog;
}

export interface ActionRunner {
  runDeploy(branchName: string, prNumber: number, repoURL: string): Promise<CommandOutcome>;
  runCleanup(branchName: string, prNumber: number): Promise<CommandOutcome>;
}

export interface CommandRunnerOptions {
  registry: ContainerRegistry;
  workRoot: string;
  publicHost: string;
  containerPort?: number;
  maxPortAttempts?: number;
  ports?: PortAllocator;
  shell?: Shell;
  now?: () => Date;
  logger?: Logger;
}

const MAX_DETAIL_OUTPUT = 2000;

function failureDetail(result: ShellResult): string {
  const detail = result.stderr.trim() || result.stdout.trim() || `Exited with code ${result.exitCode}`;
  return detail.length > MAX_DETAIL_OUTPUT ? detail.slice(-MAX_DETAIL_OUTPUT) : detail;
}

export class CommandRunner implements ActionRunner {
  private registry: ContainerRegistry;
  private workRoot: string;
  private publicHost: string;
  private containerPort: number;
  private maxPortAttempts: number;
  private ports: PortAllocator;
  private git: GitOperations;
  private docker: DockerOperations;
  private now: () => Date;
  private logger: Logger;
  private locks = new KeyedMutex();

  constructor(options: CommandRunnerOptions) {
    const shell = options.shell ?? execaShell;
    this.registry = options.registry;
    this.workRoot = options.workRoot;
    this.publicHost = options.publicHost;
    this.containerPort = options.containerPort ?? 80;
    this.maxPortAttempts = options.maxPortAttempts ?? 5;
    if (this.maxPortAttempts < 1) {
      throw new Error(`maxPortAttempts must be at least 1, got ${this.maxPortAttempts}`);
    }
    this.ports = options.ports ?? new PortAllocator();
    this.git = new GitOperations(shell);
    this.docker = new DockerOperations(shell);
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? rootLogger;
  }

  runDeploy(branchName: string, prNumber: number, repoURL: string): Promise<CommandOutcome> {
    return this.locks.runExclusive(branchName, () => this.deploy({ branchName, prNumber }, repoURL));
  }

  runCleanup(branchName: string, prNumber: number): Promise<CommandOutcome> {
    return this.locks.runExclusive(branchName, () => this.cleanup({ branchName, prNumber }));
  }

  private async deploy(key: ResourceKey, repoURL: string): Promise<CommandOutcome> {
    const log = new RunLog();
    const fields: ExtractedFields = {};
    const workDir = getWorkingDirectory(this.workRoot, key.branchName);
    this.logger.info({ ...key, workDir }, 'Deploying preview');

    try {
      await this.retirePrevious(key, log);

      await fs.remove(workDir);
      this.expect(log, 'Clone repository', await this.git.clone(repoURL, key.branchName, workDir));
      log.record('Clone repository', 'Success', `Cloned branch ${key.branchName} from ${repoURL}.`);

      if (await this.hasComposeFile(workDir)) {
        await this.deployCompose(key, workDir, log, fields);
      } else {
        await this.deployContainer(key, workDir, log, fields);
      }

      this.logger.info({ ...key, ...fields }, 'Preview deployed');
      return this.outcome(true, log, fields);
    } catch (error) {
      if (error instanceof ActionFailure) {
        this.logger.warn({ ...key, step: error.step, exitCode: error.exitCode }, 'Deployment action failed');
        return this.outcome(false, log, fields);
      }
      throw error;
    }
  }

  private async deployContainer(
    key: ResourceKey,
    workDir: string,
    log: RunLog,
    fields: ExtractedFields
  ): Promise<void> {
    const image = getImageName(key);
    this.expect(log, 'Build Docker image', await this.docker.build(image, workDir));
    log.record('Build Docker image', 'Success', `Docker image ${image} built successfully.`);

    const tried = new Set<number>();
    for (let attempt = 1; attempt <= this.maxPortAttempts; attempt++) {
      const port = await this.allocatePort(log, tried);
      tried.add(port);
      const containerName = getContainerName(key, port);
      const result = await this.docker.run(image, containerName, port, this.containerPort);

      if (result.exitCode !== 0) {
        // docker creates the container before binding the port
        log.capture(result);
        log.capture(await this.docker.removeContainer(containerName));
        if (isPortConflict(result) && attempt < this.maxPortAttempts) {
          this.logger.info({ port, containerName, attempt }, 'Port taken before container start, retrying');
          continue;
        }
        log.record('Run Docker container', 'Failed', failureDetail(result));
        throw new ActionFailure('Run Docker container', result);
      }

      log.capture(result);
      const deploymentURL = `http://${this.publicHost}:${port}`;
      await this.registry.record({ key, resourceId: containerName, port, createdAt: this.now() });
      Object.assign(fields, { containerName, port, deploymentURL });
      log.record('Run Docker container', 'Success', `Container ${containerName} running at ${deploymentURL}.`);
      return;
    }
  }

  private async deployCompose(
    key: ResourceKey,
    workDir: string,
    log: RunLog,
    fields: ExtractedFields
  ): Promise<void> {
    const project = getComposeProject(key);
    // Registered before `up`: a partial start leaves containers that cleanup must reach
    await this.registry.record({ key, resourceId: project, port: null, createdAt: this.now() });
    this.expect(log, 'Start compose stack', await this.docker.composeUp(project, workDir));
    log.record('Start compose stack', 'Success', `Compose project ${project} started.`);

    const services = await this.docker.composeServices(project, workDir);
    this.expect(log, 'Resolve service ports', services);

    const servicePorts: Record<string, number> = {};
    const names = services.stdout
      .split('\n')
      .map(name => name.trim())
      .filter(Boolean);

    for (const service of names) {
      const result = await this.docker.composePort(project, service, this.containerPort, workDir);
      log.capture(result);
      const port = result.exitCode === 0 ? parsePublishedPort(result.stdout) : null;
      if (port === null) {
        this.logger.debug({ project, service }, 'Service publishes no port');
        continue;
      }
      servicePorts[service] = port;
    }

    const published = Object.entries(servicePorts);
    fields.servicePorts = servicePorts;
    fields.serviceURLs = Object.fromEntries(
      published.map(([service, port]) => [service, `http://${this.publicHost}:${port}`])
    );
    if (published.length > 0) {
      fields.deploymentURL = `http://${this.publicHost}:${published[0][1]}`;
    }
    log.record(
      'Resolve service ports',
      'Success',
      published.length > 0
        ? published.map(([service, port]) => `${service} on port ${port}`).join(', ')
        : `No service publishes port ${this.containerPort}.`
    );
  }

  private async cleanup(key: ResourceKey): Promise<CommandOutcome> {
    const log = new RunLog();
    const workDir = getWorkingDirectory(this.workRoot, key.branchName);
    const records = await this.registry.list(key);
    this.logger.info({ ...key, records: records.length }, 'Cleaning up preview');

    let succeeded = true;
    if (records.length === 0) {
      log.record(
        'Cleanup',
        'Success',
        `No deployed resources found for branch ${key.branchName} with PR ${key.prNumber}.`
      );
    }
    for (const resource of records) {
      if (!(await this.teardown(resource, log))) {
        succeeded = false;
      }
    }

    await fs.remove(workDir);
    log.record('Remove working directory', 'Success', `Removed ${workDir}.`);

    return this.outcome(succeeded, log, {});
  }

  /**
   * Tear down earlier deployments of the same key; failures are logged only
   */
  private async retirePrevious(key: ResourceKey, log: RunLog): Promise<void> {
    for (const resource of await this.registry.list(key)) {
      await this.teardown(resource, log);
    }
  }

  /**
   * Stop one registered resource and drop its record once it is gone
   */
  private async teardown(resource: DeployedResource, log: RunLog): Promise<boolean> {
    const isCompose = resource.port === null;
    const step = isCompose
      ? `Stop compose stack ${resource.resourceId}`
      : `Remove container ${resource.resourceId}`;
    const result = isCompose
      ? await this.docker.composeDown(resource.resourceId)
      : await this.docker.removeContainer(resource.resourceId);
    log.capture(result);

    const alreadyGone = isMissingContainer(result);
    if (result.exitCode !== 0 && !alreadyGone) {
      log.record(step, 'Failed', failureDetail(result));
      this.logger.warn({ resourceId: resource.resourceId, exitCode: result.exitCode }, 'Teardown failed');
      return false;
    }

    await this.registry.remove(resource.key, resource.createdAt);
    log.record(
      step,
      'Success',
      alreadyGone
        ? `${resource.resourceId} was already removed.`
        : `${resource.resourceId} cleaned up successfully.`
    );
    return true;
  }

  private async allocatePort(log: RunLog, exclude: ReadonlySet<number>): Promise<number> {
    try {
      return await this.ports.allocate(exclude);
    } catch (error) {
      if (error instanceof PortAllocationError) {
        log.record('Run Docker container', 'Failed', error.message);
        throw new ActionFailure('Run Docker container', error.message);
      }
      throw error;
    }
  }

  private async hasComposeFile(workDir: string): Promise<boolean> {
    for (const file of COMPOSE_FILES) {
      if (await fs.pathExists(path.join(workDir, file))) {
        return true;
      }
    }
    return false;
  }

  /**
   * Capture a command result and stop the action when it failed
   */
  private expect(log: RunLog, step: string, result: ShellResult): void {
    log.capture(result);
    if (result.exitCode !== 0) {
      log.record(step, 'Failed', failureDetail(result));
      throw new ActionFailure(step, result);
    }
  }

  private outcome(succeeded: boolean, log: RunLog, extractedFields: ExtractedFields): CommandOutcome {
    return { succeeded, stdout: log.stdout, stderr: log.stderr, extractedFields, log };
  }
}

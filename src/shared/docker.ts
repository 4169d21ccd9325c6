/**
 * Docker and Docker Compose CLI operations
 */

import { execaShell, type Shell, type ShellResult } from './shell.js';

export const COMPOSE_FILES = [
  'docker-compose.yml',
  'docker-compose.yaml',
  'compose.yml',
  'compose.yaml'
];

const PORT_TAKEN_PATTERN = /port is already allocated|address already in use/i;
const MISSING_CONTAINER_PATTERN = /no such container/i;

export function isPortConflict(result: ShellResult): boolean {
  return result.exitCode !== 0 && PORT_TAKEN_PATTERN.test(result.stderr);
}

export function isMissingContainer(result: ShellResult): boolean {
  return result.exitCode !== 0 && MISSING_CONTAINER_PATTERN.test(result.stderr);
}

/**
 * Host port from `docker compose port` output such as `0.0.0.0:49153`
 */
export function parsePublishedPort(output: string): number | null {
  const line = output.trim().split('\n')[0] ?? '';
  const match = /:(\d+)$/.exec(line.trim());
  if (!match) return null;
  const port = Number(match[1]);
  return port >= 1 && port <= 65535 ? port : null;
}

export class DockerOperations {
  private shell: Shell;

  constructor(shell: Shell = execaShell) {
    this.shell = shell;
  }

  build(image: string, contextDir: string): Promise<ShellResult> {
    return this.shell.run('docker', ['build', '-t', image, '.'], { cwd: contextDir });
  }

  run(image: string, containerName: string, hostPort: number, containerPort: number): Promise<ShellResult> {
    return this.shell.run('docker', [
      'run',
      '-d',
      '-p',
      `${hostPort}:${containerPort}`,
      '--name',
      containerName,
      image
    ]);
  }

  /**
   * Stop and remove a container in one call
   */
  removeContainer(containerName: string): Promise<ShellResult> {
    return this.shell.run('docker', ['rm', '-f', containerName]);
  }

  composeUp(project: string, workDir: string): Promise<ShellResult> {
    return this.shell.run('docker', ['compose', '-p', project, 'up', '-d', '--build'], { cwd: workDir });
  }

  composeServices(project: string, workDir: string): Promise<ShellResult> {
    return this.shell.run('docker', ['compose', '-p', project, 'config', '--services'], { cwd: workDir });
  }

  composePort(project: string, service: string, containerPort: number, workDir: string): Promise<ShellResult> {
    return this.shell.run(
      'docker',
      ['compose', '-p', project, 'port', service, String(containerPort)],
      { cwd: workDir }
    );
  }

  /**
   * Tear down a compose project by name; works without the compose file
   */
  composeDown(project: string): Promise<ShellResult> {
    return this.shell.run('docker', ['compose', '-p', project, 'down', '--remove-orphans']);
  }
}

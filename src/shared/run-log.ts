/**
 * Step-by-step record of one deploy or cleanup run
 */

import fs from 'fs-extra';
import type { ShellResult } from './shell.js';

export type StepStatus = 'Success' | 'Failed';

export interface RunStep {
  name: string;
  status: StepStatus;
  message: string;
}

export class RunLog {
  readonly steps: RunStep[] = [];
  private output: string[] = [];
  private stdoutChunks: string[] = [];
  private stderrChunks: string[] = [];

  record(name: string, status: StepStatus, message: string): void {
    this.steps.push({ name, status, message });
  }

  /**
   * Append the raw output of a command
   */
  capture(result: ShellResult): void {
    this.output.push(`$ ${result.command}`);
    if (result.stdout) {
      this.output.push(result.stdout);
      this.stdoutChunks.push(result.stdout);
    }
    if (result.stderr) {
      this.output.push(result.stderr);
      this.stderrChunks.push(result.stderr);
    }
  }

  get stdout(): string {
    return this.stdoutChunks.join('\n');
  }

  get stderr(): string {
    return this.stderrChunks.join('\n');
  }

  render(): string {
    const lines = this.steps.map(step => `[${step.status}] ${step.name}: ${step.message}`);
    return [...lines, '', '--- Command output ---', ...this.output, ''].join('\n');
  }

  /**
   * Write the rendered log, replacing any earlier artifact at the same path
   */
  async save(filePath: string): Promise<string> {
    await fs.outputFile(filePath, this.render(), 'utf-8');
    return filePath;
  }
}

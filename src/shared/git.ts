/**
 * Git operations for preview checkouts
 */

import { execaShell, type Shell, type ShellResult } from './shell.js';

export class GitOperations {
  private shell: Shell;

  constructor(shell: Shell = execaShell) {
    this.shell = shell;
  }

  /**
   * Shallow-clone a single branch into `targetDir`
   * @param repoURL - Clone URL of the head repository
   * @param branchName - Branch to check out
   * @param targetDir - Destination; must not exist yet
   */
  clone(repoURL: string, branchName: string, targetDir: string): Promise<ShellResult> {
    return this.shell.run('git', [
      'clone',
      '--depth',
      '1',
      '--branch',
      branchName,
      '--single-branch',
      repoURL,
      targetDir
    ]);
  }
}

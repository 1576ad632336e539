/**
 * Git History Recorder
 *
 * Records every written snapshot as its own commit in the store root's git
 * working tree. Commits are only ever appended: no amend, no rewrite, and
 * files removed by rotation stay in history.
 */

import { access } from 'node:fs/promises';
import { join } from 'node:path';
import pLimit from 'p-limit';
import {
  HistoryError,
  type CanonicalHostname,
  type CommitId,
  type HistoryRecorder,
  type SnapshotFile,
} from '@netsnap/core';
import { execGit, identityArgs, type GitExec } from './utils/index.js';
import type { GitHistoryConfig } from './types.js';

export const DEFAULT_AUTHOR_NAME = 'netsnap';
export const DEFAULT_AUTHOR_EMAIL = 'netsnap@localhost';

export function commitMessage(hostname: CanonicalHostname, snapshot: SnapshotFile): string {
  return `Backup ${hostname} - ${snapshot.fileName}`;
}

export class GitHistoryRecorder implements HistoryRecorder {
  private repoDir: string;
  private identity: string[];
  private git: GitExec;
  // one commit in flight at a time: git holds a single index lock per repository
  private queue = pLimit(1);

  constructor(config: GitHistoryConfig) {
    this.repoDir = config.repoDir;
    this.identity = identityArgs(
      config.authorName ?? DEFAULT_AUTHOR_NAME,
      config.authorEmail ?? DEFAULT_AUTHOR_EMAIL,
    );
    this.git = config.git ?? execGit;
  }

  /**
   * Create the repository in `repoDir` if it has none of its own.
   */
  async initialize(): Promise<void> {
    const hasRepository = await access(join(this.repoDir, '.git')).then(
      () => true,
      () => false,
    );
    if (hasRepository) return;

    console.log(`[Netsnap:History] Initializing git repository in ${this.repoDir}`);
    try {
      await this.git(this.repoDir, ['init']);
    } catch (error) {
      throw new HistoryError(error instanceof Error ? error.message : String(error));
    }
  }

  record(hostname: CanonicalHostname, snapshot: SnapshotFile): Promise<CommitId> {
    return this.queue(async () => {
      try {
        await this.git(this.repoDir, ['add', '--', snapshot.relativePath]);
        await this.git(this.repoDir, [
          ...this.identity,
          'commit',
          '--no-verify',
          '-m', commitMessage(hostname, snapshot),
          '--',
          snapshot.relativePath,
        ]);
        const commitId = (await this.git(this.repoDir, ['rev-parse', 'HEAD'])).trim();

        console.log(`[Netsnap:History] Committed ${snapshot.relativePath} as ${commitId.slice(0, 12)}`);
        return commitId;
      } catch (error) {
        throw new HistoryError(error instanceof Error ? error.message : String(error), hostname);
      }
    });
  }
}

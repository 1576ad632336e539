import type { GitExec } from './utils/index.js';

export interface GitHistoryConfig {
  /** Working tree root; snapshot relative paths are resolved against it */
  repoDir: string;
  authorName?: string;
  authorEmail?: string;
  /** Replaces the git CLI, mainly for tests */
  git?: GitExec;
}

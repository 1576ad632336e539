/**
 * @netsnap/history-git
 *
 * Append-only snapshot history backed by a git working tree.
 */

export {
  GitHistoryRecorder,
  commitMessage,
  DEFAULT_AUTHOR_NAME,
  DEFAULT_AUTHOR_EMAIL,
} from './git-history-recorder.js';
export { execGit, identityArgs, type GitExec } from './utils/index.js';

export type { GitHistoryConfig } from './types.js';

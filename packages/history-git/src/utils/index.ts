export { execGit, identityArgs, type GitExec } from './git-utils.js';

import { spawn } from 'node:child_process';

/**
 * Runs one git command and resolves with its stdout.
 */
export type GitExec = (cwd: string | null, args: string[]) => Promise<string>;

export const execGit: GitExec = (cwd, args) => {
  return new Promise((resolve, reject) => {
    const proc = spawn('git', args, {
      cwd: cwd ?? undefined,
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
    });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data) => { stdout += data.toString(); });
    proc.stderr.on('data', (data) => { stderr += data.toString(); });

    proc.on('close', (code) => {
      if (code === 0) {
        resolve(stdout);
      } else {
        const subcommand = args.find(arg => !arg.startsWith('-') && !arg.includes('=')) ?? 'command';
        reject(new Error(`git ${subcommand} failed: ${(stderr || stdout).trim()}`));
      }
    });

    proc.on('error', reject);
  });
};

/**
 * `-c` options that set the commit identity without touching git config files.
 */
export function identityArgs(name: string, email: string): string[] {
  return ['-c', `user.name=${name}`, '-c', `user.email=${email}`];
}

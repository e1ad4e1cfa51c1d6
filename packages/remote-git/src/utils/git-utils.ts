import { spawn } from 'node:child_process';
import { CommandFailedError } from '@chunkstash/core';

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  cwd?: string | null;
  env?: NodeJS.ProcessEnv;
}

/**
 * Run a command to completion, capturing its output. Resolves whatever the
 * exit status; rejects only when the process cannot be started.
 */
export async function runCommand(
  command: string,
  args: string[],
  options: RunCommandOptions = {},
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      cwd: options.cwd ?? undefined,
      env: { ...process.env, ...options.env },
    });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data: Buffer) => { stdout += data.toString(); });
    proc.stderr.on('data', (data: Buffer) => { stderr += data.toString(); });

    proc.on('close', (code) => {
      resolve({ exitCode: code, stdout, stderr });
    });

    proc.on('error', reject);
  });
}

export async function execGit(cwd: string | null, args: string[]): Promise<string> {
  const result = await runCommand('git', args, {
    cwd,
    env: { GIT_TERMINAL_PROMPT: '0' },
  });

  if (result.exitCode !== 0) {
    throw new CommandFailedError('git', args, result.exitCode, result.stderr || result.stdout);
  }
  return result.stdout;
}

import { spawnSync } from 'child_process';

export interface CommandResult {
  status: number;
  stdout: string;
}

export interface CommandOptions {
  input?: string;
  timeoutMs?: number;
  // 'ignore' for programs that leave a background child holding stdout (xclip)
  stdout?: 'pipe' | 'ignore';
}

/**
 * Runs an external program synchronously. `null` means it could not be run at
 * all (missing binary, timeout, killed by a signal).
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => CommandResult | null;

export const runCommand: CommandRunner = (command, args, options = {}) => {
  const result = spawnSync(command, args, {
    encoding: 'utf-8',
    input: options.input,
    timeout: options.timeoutMs,
    stdio: ['pipe', options.stdout ?? 'pipe', 'ignore'],
  });

  if (result.error || result.status === null) {
    return null;
  }

  return { status: result.status, stdout: result.stdout ?? '' };
};

/**
 * Splits a configured command line such as `xclip -selection clipboard`.
 */
export function parseCommandLine(commandLine: string): { command: string; args: string[] } {
  const [command = '', ...args] = commandLine.trim().split(/\s+/);
  return { command, args };
}

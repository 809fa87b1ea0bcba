import { spawn } from 'node:child_process';
import { CommandFailedError } from './errors';

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type OutputMode = 'capture' | 'inherit' | 'ignore';

export type CommandOptions = {
  /** Extra variables for the child only; merged over process.env */
  env?: Record<string, string>;
  /** What happens to the child's stdout. Defaults to 'ignore' */
  stdout?: OutputMode;
};

export type CommandExecutor = (command: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

/** Upper bound on captured stdout, in characters */
export const STDOUT_CAPTURE_LIMIT = 64 * 1024;

/** Only the end of stderr is kept, for error messages */
export const STDERR_TAIL_LIMIT = 4 * 1024;

export const appendTail = (buffer: string, chunk: string, limit: number): string => {
  const combined = buffer + chunk;
  return combined.length > limit ? combined.slice(combined.length - limit) : combined;
};

/**
 * Builds the child environment for one invocation.
 * process.env is copied, never written to, so credentials only live as long as the child's env object.
 */
export const buildChildEnv = (extra: Record<string, string> = {}): NodeJS.ProcessEnv => ({
  ...process.env,
  ...extra,
});

export const credentialEnv = (password: string): Record<string, string> => ({ PGPASSWORD: password });

/**
 * Spawn a command and wait for it to exit.
 * Resolves with the exit code whatever it is; rejects only when the process cannot be started.
 * stdout is kept only in 'capture' mode and stderr only as a tail, both bounded.
 */
export const executeCommand: CommandExecutor = (command, args, options = {}) => {
  const stdoutMode = options.stdout ?? 'ignore';

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      env: buildChildEnv(options.env),
      stdio: ['ignore', stdoutMode === 'capture' ? 'pipe' : stdoutMode, 'pipe'],
    });
    let stdout = '';
    let stderr = '';

    if (proc.stdout) {
      proc.stdout.setEncoding('utf8');
      proc.stdout.on('data', (data: string) => {
        stdout = appendTail(stdout, data, STDOUT_CAPTURE_LIMIT);
      });
    }

    proc.stderr?.setEncoding('utf8');
    proc.stderr?.on('data', (data: string) => {
      stderr = appendTail(stderr, data, STDERR_TAIL_LIMIT);
    });

    proc.on('error', (error) => {
      reject(new CommandFailedError(command, null, stderr, error));
    });

    proc.on('close', (code, signal) => {
      resolve({ exitCode: code ?? (signal ? 128 : 1), stdout, stderr });
    });
  });
};

/**
 * Like the executor itself, but a non-zero exit becomes a CommandFailedError.
 */
export const runChecked = async (
  execute: CommandExecutor,
  command: string,
  args: string[],
  options?: CommandOptions
): Promise<CommandResult> => {
  const result = await execute(command, args, options);
  if (result.exitCode !== 0) {
    throw new CommandFailedError(command, result.exitCode, result.stderr);
  }
  return result;
};

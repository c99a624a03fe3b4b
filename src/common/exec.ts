import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { GitCommandError } from './errors';

const execFileAsync = promisify(execFile);

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export interface ExecOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  /**
   * Values replaced by `***` wherever the command line is rendered (errors, logs).
   */
  secrets?: string[];
}

export function redact(text: string, secrets: string[] = []): string {
  return secrets
    .filter((secret) => secret.length > 0)
    .reduce((acc, secret) => acc.split(secret).join('***'), text);
}

export function renderCommand(file: string, args: string[], secrets: string[] = []): string {
  return redact([file, ...args].join(' '), secrets);
}

function outputToString(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf8');
  }
  return '';
}

/**
 * Execute a command and return the raw stdout/stderr as UTF-8 strings.
 * Throws `GitCommandError` if the command exits with non-zero status.
 */
export async function runCommand(
  file: string,
  args: string[],
  options: ExecOptions = {},
): Promise<ExecResult> {
  const { cwd, env, timeoutMs, secrets } = options;

  try {
    const result = await execFileAsync(file, args, {
      cwd,
      env,
      timeout: timeoutMs,
      maxBuffer: 16 * 1024 * 1024,
    });

    return {
      stdout: outputToString(result.stdout),
      stderr: outputToString(result.stderr),
    };
  } catch (error) {
    if (error instanceof Error) {
      const stdout = 'stdout' in error ? outputToString(error.stdout) : '';
      const stderr = 'stderr' in error ? outputToString(error.stderr) : '';
      const cmdString = renderCommand(file, args, secrets);
      throw new GitCommandError(
        redact(`Command failed (${cmdString}): ${error.message}\nstdout: ${stdout}\nstderr: ${stderr}`, secrets),
        cmdString,
        redact(stdout, secrets),
        redact(stderr, secrets),
      );
    }
    throw error;
  }
}

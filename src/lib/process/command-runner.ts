import { spawn } from 'child_process';
import { ExternalCommandError } from '../errors.js';
import { debugCommand } from '../../logger.js';

/** Captured result of one external program run. */
export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  /** Raw bytes, passed through to the caller's stderr on failure */
  stderr: Buffer;
}

/**
 * Runs external programs. Resolves with the exit status whatever it is;
 * rejects only when the program could not be started.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[]): Promise<CommandResult>;
}

/** CommandRunner backed by child_process.spawn, without a shell. */
export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: readonly string[]): Promise<CommandResult> {
    debugCommand('spawn %s %o', command, args);
    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
      child.on('error', (err) => reject(ExternalCommandError.spawnFailed(command, args, err)));
      child.on('close', (code) => {
        debugCommand('%s exited with %s', command, code);
        resolve({
          exitCode: code,
          stdout: Buffer.concat(stdout).toString('utf-8'),
          stderr: Buffer.concat(stderr),
        });
      });
    });
  }
}

/**
 * Run a program and fail on anything but exit code 0.
 * @returns stdout of the successful run
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
): Promise<string> {
  const result = await runner.run(command, args);
  if (result.exitCode !== 0) {
    throw ExternalCommandError.failed(command, args, result.exitCode, result.stdout, result.stderr);
  }
  return result.stdout;
}

import { spawn, SpawnOptions } from 'child_process';
import { createReadStream, createWriteStream } from 'fs';
import { pipeline } from 'stream/promises';
import {
  CommandRunner as ICommandRunner,
  CommandResult,
  CommandSpec,
} from '../interfaces/CommandRunner';
import { errorCode, toError } from '../utils/errors';

const MAX_STDERR_LENGTH = 16 * 1024;

export class CommandError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CommandError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * True when the tool exited with 0 and neither the input nor the output stage failed
 */
export function isSuccessful(result: CommandResult): boolean {
  return result.exitCode === 0 && !result.inputError && !result.outputError;
}

/**
 * Describe why a command did not succeed, checking each stage separately
 */
export function describeCommandFailure(command: string, result: CommandResult): string {
  if (result.signal) {
    return `${command} was terminated by ${result.signal}`;
  }

  if (result.exitCode !== 0) {
    const lastLine = result.stderr.trim().split('\n').pop();
    return lastLine
      ? `${command} failed with exit code ${result.exitCode}: ${lastLine}`
      : `${command} failed with exit code ${result.exitCode}`;
  }

  if (result.inputError) {
    return `reading input for ${command} failed: ${result.inputError.message}`;
  }

  if (result.outputError) {
    return `writing output of ${command} failed: ${result.outputError.message}`;
  }

  return `${command} failed`;
}

/**
 * Runs external tools without a shell. Stdout can be redirected into a file and
 * stdin fed from a file through transform streams; each stage reports its own
 * failure in the result.
 */
export class CommandRunner implements ICommandRunner {
  async run(spec: CommandSpec): Promise<CommandResult> {
    const options: SpawnOptions = {
      stdio: [spec.stdinFile ? 'pipe' : 'ignore', 'pipe', 'pipe'],
      env: { ...process.env },
    };
    if (spec.timeoutMs) {
      options.timeout = spec.timeoutMs;
      options.killSignal = 'SIGTERM';
    }

    const child = spawn(spec.command, spec.args, options);

    let stderr = '';
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr = (stderr + chunk.toString()).slice(-MAX_STDERR_LENGTH);
    });

    const exited = new Promise<Pick<CommandResult, 'exitCode' | 'signal'>>((resolve, reject) => {
      child.once('error', error => {
        child.stdin?.destroy();
        child.stdout?.destroy();
        reject(new CommandError(this.analyzeSpawnError(spec.command, error), spec.command, error));
      });
      child.once('close', (exitCode, signal) => resolve({ exitCode, signal }));
    });

    let output: Promise<void> = Promise.resolve();
    if (spec.stdoutFile && child.stdout) {
      output = pipeline(child.stdout, createWriteStream(spec.stdoutFile));
    } else {
      child.stdout?.resume();
    }

    let input: Promise<void> = Promise.resolve();
    if (spec.stdinFile && child.stdin) {
      input = pipeline([createReadStream(spec.stdinFile), ...(spec.stdinTransforms ?? []), child.stdin]);
    }

    const [exitOutcome, inputOutcome, outputOutcome] = await Promise.allSettled([
      exited,
      input,
      output,
    ]);

    if (exitOutcome.status === 'rejected') {
      throw exitOutcome.reason;
    }

    const result: CommandResult = { ...exitOutcome.value, stderr };
    if (inputOutcome.status === 'rejected') {
      result.inputError = toError(inputOutcome.reason);
    }
    if (outputOutcome.status === 'rejected') {
      result.outputError = toError(outputOutcome.reason);
    }
    return result;
  }

  private analyzeSpawnError(command: string, error: Error): string {
    switch (errorCode(error)) {
      case 'ENOENT':
        return `${command} command not found. Please ensure the MariaDB client tools are installed and on PATH.`;
      case 'EACCES':
        return `Permission denied executing ${command}. Please check file permissions.`;
      default:
        return `Failed to execute ${command}: ${error.message}`;
    }
  }
}

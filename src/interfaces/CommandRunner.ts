import { Transform } from 'stream';

/**
 * An external tool invocation, passed to the OS as a discrete argument list
 */
export interface CommandSpec {
  command: string;
  args: string[];

  /** Redirect the tool's stdout into this file (truncated first) */
  stdoutFile?: string;

  /** Feed the tool's stdin from this file */
  stdinFile?: string;

  /** Streams the stdin file passes through before reaching the tool, e.g. gunzip */
  stdinTransforms?: Transform[];

  /** Terminate the tool after this many milliseconds */
  timeoutMs?: number;
}

export interface CommandResult {
  /** Exit code of the tool, null when it was killed by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;

  /** Failure while reading or transforming the stdin file */
  inputError?: Error;

  /** Failure while writing the stdout file */
  outputError?: Error;
}

export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;
}

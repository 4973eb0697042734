import { spawn } from 'node:child_process';

export type CommandOutput = {
  readonly stdout: Buffer;
  readonly stderr: Buffer;
};

export type RunCommandOptions = {
  /** Bytes written to the child's stdin before it is closed. */
  input?: Uint8Array;
  cwd?: string;
  /** Kill the child with SIGKILL after this many milliseconds. */
  timeoutMs?: number;
};

export class CommandError extends Error {
  readonly command: string;
  readonly args: readonly string[];
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stderr: string;

  constructor(
    command: string,
    args: readonly string[],
    exitCode: number | null,
    signal: NodeJS.Signals | null,
    stderr: Buffer,
  ) {
    const reason = signal ? `signal ${signal}` : `exit code ${exitCode ?? 'unknown'}`;
    super(`Command "${command} ${args.join(' ')}" failed with ${reason}`);
    this.name = 'CommandError';
    this.command = command;
    this.args = [...args];
    this.exitCode = exitCode;
    this.signal = signal;
    this.stderr = stderr.toString('utf8').trim();
  }
}

export const runCommand = async (
  command: string,
  args: readonly string[],
  options: RunCommandOptions = {},
): Promise<CommandOutput> => {
  const child = spawn(command, args, {
    cwd: options.cwd,
    timeout: options.timeoutMs,
    killSignal: 'SIGKILL',
    stdio: [options.input ? 'pipe' : 'ignore', 'pipe', 'pipe'],
  });

  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];
  child.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
  child.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

  if (options.input && child.stdin) {
    child.stdin.end(options.input);
  }

  const [exitCode, signal] = await new Promise<[number | null, NodeJS.Signals | null]>(
    (resolve, reject) => {
      child.once('error', reject);
      child.once('close', (code, closeSignal) => resolve([code, closeSignal]));
    },
  );

  const stdout = Buffer.concat(stdoutChunks);
  const stderr = Buffer.concat(stderrChunks);
  if (exitCode !== 0) {
    throw new CommandError(command, args, exitCode, signal, stderr);
  }
  return { stdout, stderr };
};

import { execFile } from 'node:child_process';

/** TSV output of a full page easily exceeds execFile's 1 MiB default */
const MAX_BUFFER = 64 * 1024 * 1024;

export interface CommandOutput {
  readonly stdout: string;
  readonly stderr: string;
}

export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandOutput>;

export class CommandError extends Error {
  readonly command: string;
  /** Exit code, or the errno string (e.g. ENOENT) when the process never started */
  readonly code: number | string | null;
  readonly stderr: string;

  constructor(command: string, code: number | string | null, stderr: string, cause?: unknown) {
    const detail = stderr.trim();
    const reason = typeof code === 'string' ? `could not be started (${code})` : `exited with code ${code}`;
    super(detail ? `${command} ${reason}: ${detail}` : `${command} ${reason}`);
    this.name = 'CommandError';
    this.command = command;
    this.code = code;
    this.stderr = stderr;
    this.cause = cause;
  }

  get spawnFailed(): boolean {
    return typeof this.code === 'string';
  }
}

function errorCode(error: Error): number | string | null {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'number' || typeof code === 'string' ? code : null;
}

export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      [...args],
      { encoding: 'utf8', maxBuffer: MAX_BUFFER, windowsHide: true },
      (error, stdout, stderr) => {
        if (error) {
          reject(new CommandError(command, errorCode(error), stderr, error));
          return;
        }
        resolve({ stdout, stderr });
      },
    );
  });

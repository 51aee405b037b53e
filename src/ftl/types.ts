/**
 * Output of a finished child process
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs a command without a shell and collects its output
 */
export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export type SetConfigResult =
  | { ok: true }
  | { ok: false; error: string; exitCode: number };

/**
 * Where FTL settings are read from and written to.
 * Key names and values are passed through untouched; the backend validates them.
 */
export interface ConfigBackend {
  get(key: string): Promise<string>;
  set(key: string, value: string): Promise<SetConfigResult>;
}

/**
 * Error thrown when the FTL binary rejects a request
 */
export class FtlClientError extends Error {
  public readonly stderr: string;
  public readonly exitCode: number;

  constructor(message: string, stderr: string, exitCode: number) {
    super(message);
    this.name = 'FtlClientError';
    this.stderr = stderr;
    this.exitCode = exitCode;
  }
}

export interface ProcessOutput {
  stdout: Buffer;
  stderr: Buffer;
  /** -1 when the process was killed by a signal. */
  exitCode: number;
}

export interface ProcessRunOptions {
  timeoutMs: number;
  cwd?: string;
}

export interface ProcessRunner {
  /**
   * Run `command[0]` with the remaining arguments and capture both streams.
   * Rejects with ProcessTimeoutError when `timeoutMs` elapses (the process is
   * killed first) and with the spawn error when the binary cannot start.
   */
  run(command: readonly string[], options: ProcessRunOptions): Promise<ProcessOutput>;

  /** Yield stdout line by line as the process produces it. */
  stream(command: readonly string[], options?: { cwd?: string }): AsyncIterable<string>;
}

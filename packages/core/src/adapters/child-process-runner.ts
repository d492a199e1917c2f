import { spawn, type ChildProcess } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { ProcessOutput, ProcessRunner, ProcessRunOptions } from '../ports/process-runner.js';
import { ProcessTimeoutError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('child-process-runner');

const KILL_GRACE_MS = 3000;

/** SIGTERM the whole process group, then SIGKILL whatever is left after a grace period. */
function terminate(child: ChildProcess) {
  const pid = child.pid;
  if (!pid) {
    try { child.kill('SIGKILL'); } catch { /* already exited */ }
    return;
  }
  try {
    process.kill(-pid, 'SIGTERM');
  } catch {
    try { child.kill('SIGTERM'); } catch { /* already exited */ }
  }
  setTimeout(() => {
    try { process.kill(-pid, 'SIGKILL'); } catch { /* already exited */ }
  }, KILL_GRACE_MS).unref();
}

function splitCommand(command: readonly string[]): [string, string[]] {
  const [binary, ...args] = command;
  if (!binary) {
    throw new Error('Cannot spawn an empty command');
  }
  return [binary, args];
}

export class ChildProcessRunner implements ProcessRunner {
  run(command: readonly string[], options: ProcessRunOptions): Promise<ProcessOutput> {
    return new Promise((resolve, reject) => {
      const [binary, args] = splitCommand(command);
      const spawnedAt = Date.now();

      const child = spawn(binary, args, {
        cwd: options.cwd,
        env: process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: true,
      });
      log.debug(`run: spawned ${binary} with PID ${child.pid}`);

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        log.warn(`run: ${binary} exceeded ${options.timeoutMs}ms, terminating PID ${child.pid}`);
        terminate(child);
        reject(new ProcessTimeoutError(options.timeoutMs / 1000));
      }, options.timeoutMs);

      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (err) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        log.error(`run: ${binary} spawn error:`, err.message);
        reject(err);
      });

      child.on('close', (code, signal) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        log.debug(`run: ${binary} closed (code=${code}, signal=${signal}) after ${Date.now() - spawnedAt}ms`);
        resolve({
          stdout: Buffer.concat(stdout),
          stderr: Buffer.concat(stderr),
          exitCode: code ?? -1,
        });
      });
    });
  }

  async *stream(command: readonly string[], options: { cwd?: string } = {}): AsyncIterable<string> {
    const [binary, args] = splitCommand(command);
    const child = spawn(binary, args, {
      cwd: options.cwd,
      env: process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });
    child.stderr?.resume();

    const finished = new Promise<{ code: number; error?: Error }>((resolve) => {
      child.once('error', (error) => resolve({ code: -1, error }));
      child.once('close', (code) => resolve({ code: code ?? -1 }));
    });

    if (child.stdout) {
      const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
      try {
        for await (const line of lines) {
          yield line;
        }
      } finally {
        lines.close();
        if (child.exitCode === null && child.signalCode === null) {
          terminate(child);
        }
      }
    }

    const { code, error } = await finished;
    if (error) throw error;
    log.debug(`stream: ${binary} exited with code ${code}`);
  }
}

import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import { delimiter, join } from 'node:path';
import { KNOWN_AGENTS, type DetectedAgent, type KnownAgentInfo } from '../domain/agent/agent-config.js';
import type { ProcessRunner } from '../ports/process-runner.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('agent-detector');

const VERSION_PATTERN = /(\d+\.\d+\.\d+)/;
const VERSION_TIMEOUT_MS = 10_000;

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export interface AgentDetectorOptions {
  runner: ProcessRunner;
  /** Defaults to process.env.PATH. */
  pathEnv?: string;
  agents?: readonly KnownAgentInfo[];
}

/** Finds the known agent CLIs on PATH and probes their versions. */
export class AgentDetector {
  private readonly runner: ProcessRunner;
  private readonly pathEnv: string;
  private readonly agents: readonly KnownAgentInfo[];

  constructor(options: AgentDetectorOptions) {
    this.runner = options.runner;
    this.pathEnv = options.pathEnv ?? process.env.PATH ?? '';
    this.agents = options.agents ?? KNOWN_AGENTS;
  }

  async which(binary: string): Promise<string | null> {
    for (const dir of this.pathEnv.split(delimiter)) {
      if (!dir) continue;
      const candidate = join(dir, binary);
      if (await isExecutable(candidate)) return candidate;
    }
    return null;
  }

  async detectAll(): Promise<Map<string, DetectedAgent>> {
    const probes = this.agents.map(async (info): Promise<DetectedAgent | null> => {
      const binaryPath = await this.which(info.binary);
      if (!binaryPath) {
        log.debug(`detectAll: ${info.name} not found on PATH`);
        return null;
      }
      log.info(`detectAll: found ${info.name} at ${binaryPath}`);
      return {
        name: info.name,
        binaryPath,
        version: await this.probeVersion(binaryPath),
        displayName: info.displayName,
        provider: info.provider,
        available: true,
      };
    });

    const detected = new Map<string, DetectedAgent>();
    const settled = await Promise.allSettled(probes);
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        log.warn('detectAll: detection failed:', outcome.reason);
      } else if (outcome.value) {
        detected.set(outcome.value.name, outcome.value);
      }
    }
    return detected;
  }

  private async probeVersion(binaryPath: string): Promise<string> {
    try {
      const { stdout, stderr } = await this.runner.run([binaryPath, '--version'], { timeoutMs: VERSION_TIMEOUT_MS });
      const text = stdout.length > 0 ? stdout.toString('utf-8') : stderr.toString('utf-8');
      return VERSION_PATTERN.exec(text)?.[1] ?? 'unknown';
    } catch (err) {
      log.warn(`probeVersion: ${binaryPath} --version failed:`, err instanceof Error ? err.message : String(err));
      return 'unknown';
    }
  }
}

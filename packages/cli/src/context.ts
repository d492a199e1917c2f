import {
  AgentDetector,
  ChildProcessRunner,
  ConfigService,
  JsonConfigStore,
  createRuntime,
  type AppConfig,
  type DetectedAgent,
  type Runtime,
} from '@neurones/core';
import { getConfigDir } from './adapters/xdg-paths.js';

export interface CliContext {
  config: AppConfig;
  detected: Map<string, DetectedAgent>;
  runtime: Runtime;
}

export function createConfigService(): ConfigService {
  return new ConfigService(new JsonConfigStore(getConfigDir()));
}

export async function detectAgents(runner = new ChildProcessRunner()): Promise<Map<string, DetectedAgent>> {
  return new AgentDetector({ runner }).detectAll();
}

/** Resolve config, scan PATH and wire the executor; throws NoAgentsDetectedError when nothing is installed. */
export async function createCliContext(options: { primary?: string; cwd?: string } = {}): Promise<CliContext> {
  const runner = new ChildProcessRunner();
  const config = await createConfigService().resolve();
  const detected = await detectAgents(runner);
  const runtime = createRuntime({ config, detected, runner, cwd: options.cwd, primary: options.primary });
  return { config, detected, runtime };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

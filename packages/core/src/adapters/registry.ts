import { isKnownAgentName, type KnownAgentName } from '../domain/agent/agent-config.js';
import type { AdapterFactory } from '../ports/agent-adapter.js';
import { ClaudeAdapter } from './claude-adapter.js';
import { CodexAdapter } from './codex-adapter.js';
import { GeminiAdapter } from './gemini-adapter.js';

export const ADAPTER_FACTORIES: Record<KnownAgentName, AdapterFactory> = {
  claude: (settings) => new ClaudeAdapter(settings),
  gemini: (settings) => new GeminiAdapter(settings),
  codex: (settings) => new CodexAdapter(settings),
};

export function getAdapterFactory(name: string): AdapterFactory | undefined {
  return isKnownAgentName(name) ? ADAPTER_FACTORIES[name] : undefined;
}

export type KnownAgentName = 'claude' | 'gemini' | 'codex';

/** Settings an adapter is constructed with. */
export interface AdapterSettings {
  binaryPath: string;
  timeoutSeconds: number;
  autoApprove: boolean;
  defaultModel?: string | null;
  maxTurns?: number | null;
  extraArgs: string[];
}

/** Per-invocation flags; anything left undefined falls back to the adapter's settings. */
export interface CommandOptions {
  jsonOutput?: boolean;
  model?: string | null;
  autoApprove?: boolean;
  systemPrompt?: string | null;
  maxTurns?: number | null;
}

export interface DetectedAgent {
  name: string;
  binaryPath: string;
  version: string;
  displayName: string;
  provider: string;
  available: boolean;
}

export interface KnownAgentInfo {
  name: KnownAgentName;
  binary: string;
  displayName: string;
  provider: string;
}

export const KNOWN_AGENTS: readonly KnownAgentInfo[] = [
  { name: 'claude', binary: 'claude', displayName: 'Claude Code', provider: 'Anthropic' },
  { name: 'gemini', binary: 'gemini', displayName: 'Gemini CLI', provider: 'Google' },
  { name: 'codex', binary: 'codex', displayName: 'Codex CLI', provider: 'OpenAI' },
];

export function isKnownAgentName(name: string): name is KnownAgentName {
  return KNOWN_AGENTS.some((agent) => agent.name === name);
}

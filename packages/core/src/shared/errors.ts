export class NeuronesError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'NeuronesError';
  }
}

export class ConfigError extends NeuronesError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class AgentNotFoundError extends NeuronesError {
  constructor(
    public readonly agentName: string,
    public readonly available: readonly string[] = [],
  ) {
    super(
      available.length > 0 ? `Unknown agent: ${agentName} (available: ${available.join(', ')})` : `Unknown agent: ${agentName}`,
      'AGENT_NOT_FOUND',
    );
    this.name = 'AgentNotFoundError';
  }
}

export class ProcessTimeoutError extends NeuronesError {
  constructor(public readonly timeoutSeconds: number) {
    super(`Process timed out after ${timeoutSeconds}s`, 'PROCESS_TIMEOUT');
    this.name = 'ProcessTimeoutError';
  }
}

export class NoAgentsDetectedError extends NeuronesError {
  constructor() {
    super(
      'No AI CLI agents detected. Install at least one of:\n' +
        '  - Claude Code: https://docs.anthropic.com/en/docs/claude-code\n' +
        '  - Gemini CLI:  https://github.com/google-gemini/gemini-cli\n' +
        '  - Codex CLI:   https://github.com/openai/codex',
      'NO_AGENTS',
    );
    this.name = 'NoAgentsDetectedError';
  }
}

/** Base class for failures inside one orchestration run. */
export class OrchestrationError extends NeuronesError {
  constructor(message: string, code = 'ORCHESTRATION_ERROR') {
    super(message, code);
    this.name = 'OrchestrationError';
  }
}

/** The primary agent could not produce a usable delegation plan. Recoverable. */
export class AnalysisError extends OrchestrationError {
  constructor(message: string, code = 'ANALYSIS_ERROR') {
    super(message, code);
    this.name = 'AnalysisError';
  }
}

export class PlanParseError extends AnalysisError {
  constructor(message: string, public readonly rawOutput = '') {
    super(message, 'PLAN_PARSE_ERROR');
    this.name = 'PlanParseError';
  }
}

/** A coordinator-only primary has nobody to delegate to. Fatal. */
export class NoWorkersAvailableError extends OrchestrationError {
  constructor(public readonly primary: string) {
    super(`No worker agents available for coordinator-only primary '${primary}'`, 'NO_WORKERS');
    this.name = 'NoWorkersAvailableError';
  }
}

// Domain types
export type {
  KnownAgentName,
  AdapterSettings,
  CommandOptions,
  DetectedAgent,
  KnownAgentInfo,
} from './domain/agent/agent-config.js';
export { KNOWN_AGENTS, isKnownAgentName } from './domain/agent/agent-config.js';
export type { AgentResult, StatusLabel } from './domain/agent/agent-result.js';
export { createAgentResult, resultFromError, getStatusLabel, truncateOutput } from './domain/agent/agent-result.js';
export { isRateLimited, extractRetryAfter } from './domain/agent/rate-limit.js';

export type { AgentSettings, RetryPolicy, AppConfig } from './domain/config/app-config.js';
export {
  DEFAULT_RETRY_POLICY,
  DEFAULT_AGENT_SETTINGS,
  createDefaultConfig,
  getAgentSettings,
  normalizeAppConfig,
  applyConfigValue,
} from './domain/config/app-config.js';

export type { SubtaskPriority, PlannedSubtask, DelegationPlan } from './domain/orchestration/delegation-plan.js';
export { parseDelegationPlan } from './domain/orchestration/delegation-plan.js';
export { extractJsonBlock, parseJsonLoose } from './domain/orchestration/json-extract.js';
export {
  ORCHESTRATION_SYSTEM_PROMPT,
  buildCoordinatorOnlyPolicy,
  buildAnalysisPrompt,
  buildSynthesisPrompt,
} from './domain/orchestration/prompts.js';

// Port interfaces
export type { AgentAdapter, AdapterFactory } from './ports/agent-adapter.js';
export type { AgentRunner, AgentRunStatus, AgentTask, RunOptions, ParallelRunOptions } from './ports/agent-runner.js';
export type { ConfigStore } from './ports/config-store.js';
export type { ProcessRunner, ProcessOutput, ProcessRunOptions } from './ports/process-runner.js';
export type {
  OrchestrationEvents,
  OrchestrationMode,
  OrchestrationOutcome,
  OrchestrationStage,
} from './ports/orchestration-events.js';

// Adapters
export { ClaudeAdapter } from './adapters/claude-adapter.js';
export { GeminiAdapter } from './adapters/gemini-adapter.js';
export { CodexAdapter } from './adapters/codex-adapter.js';
export { ADAPTER_FACTORIES, getAdapterFactory } from './adapters/registry.js';
export { ChildProcessRunner } from './adapters/child-process-runner.js';
export { AgentDetector } from './adapters/agent-detector.js';
export type { AgentDetectorOptions } from './adapters/agent-detector.js';
export { JsonConfigStore } from './adapters/json-config-store.js';

// Application services
export { AgentExecutor } from './services/agent-executor.js';
export type { AgentExecutorDeps, Sleep } from './services/agent-executor.js';
export { Orchestrator } from './services/orchestrator.js';
export type { OrchestratorDeps } from './services/orchestrator.js';
export { Comparator } from './services/comparator.js';
export type { ComparatorDeps } from './services/comparator.js';
export { ConfigService } from './services/config-service.js';
export { buildAdapters, resolvePrimary, createRuntime } from './services/runtime.js';
export type { Runtime, RuntimeOptions } from './services/runtime.js';

// Shared
export { createLogger, setLogLevel, getLogLevel } from './shared/logger.js';
export type { Logger, LogLevel } from './shared/logger.js';
export {
  NeuronesError,
  ConfigError,
  AgentNotFoundError,
  ProcessTimeoutError,
  NoAgentsDetectedError,
  OrchestrationError,
  AnalysisError,
  PlanParseError,
  NoWorkersAvailableError,
} from './shared/errors.js';

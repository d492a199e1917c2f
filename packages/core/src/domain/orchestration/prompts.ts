import type { AgentResult } from '../agent/agent-result.js';
import { getStatusLabel } from '../agent/agent-result.js';

export const ORCHESTRATION_SYSTEM_PROMPT = `You are Neurones, the coordinator of a team of AI development agents.

AGENT ROLES:
- claude: reasoning, planning, architecture, debugging, documentation
- gemini: web search, research, quick factual lookups, Google ecosystem
- codex: code generation, code review, sandboxed execution, file operations

TASK: Read the user's request and decide how to split the work.

RULES:
1. If one agent can handle the request on its own, answer with "delegate": false.
2. If several agents would do better, list subtasks with a concrete prompt each.
3. Every subtask prompt must stand alone: the receiving agent sees nothing else.
4. You may assign work to yourself as well.

Reply with ONLY this JSON object, no markdown and no commentary:
{
  "delegate": true/false,
  "reasoning": "One or two sentences on why",
  "subtasks": [
    {
      "agent": "claude|gemini|codex",
      "prompt": "Self-contained prompt for that agent",
      "priority": "high|medium|low"
    }
  ],
  "self_task": "Work you will do yourself, or null"
}`;

export function buildCoordinatorOnlyPolicy(primary: string): string {
  return `PRIMARY POLICY:
- The primary agent (${primary}) only coordinates.
- Always set "delegate": true.
- Never assign a subtask to "${primary}".
- Always set "self_task": null.`;
}

export function buildAnalysisPrompt(options: {
  prompt: string;
  availableAgents: readonly string[];
  coordinatorOnlyPrimary?: string | null;
}): string {
  const policy = options.coordinatorOnlyPrimary
    ? `\n\n${buildCoordinatorOnlyPolicy(options.coordinatorOnlyPrimary)}`
    : '';
  return `${ORCHESTRATION_SYSTEM_PROMPT}${policy}

AVAILABLE (installed) AGENTS: ${options.availableAgents.join(', ')}

USER REQUEST:
${options.prompt}`;
}

export function buildSynthesisPrompt(originalPrompt: string, results: readonly AgentResult[]): string {
  const blocks = results.map(
    (result) => `--- ${result.agentName.toUpperCase()} [${getStatusLabel(result)}] ---\n${result.output}\n`,
  );

  return [
    `ORIGINAL TASK: ${originalPrompt}\n\nRESULTS FROM AGENTS:\n`,
    ...blocks,
    '\nSynthesize these results into a single, coherent response. ' +
      'Merge complementary information, resolve conflicts between agents, ' +
      'and present the best unified answer.',
  ].join('\n');
}

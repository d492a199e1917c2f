import { writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import React from 'react';
import { render as inkRender } from 'ink';
import type { Command } from 'commander';
import { Orchestrator, setLogLevel, type OrchestrationOutcome } from '@neurones/core';
import { createCallbackEventBridge } from '../adapters/callback-event-bridge.js';
import { createCliContext, errorMessage, type CliContext } from '../context.js';
import { createFormatter, requestedFormat, type OutputFormat } from '../formatters/formatter.js';
import { App } from '../ui/App.js';
import { statusIcon } from '../ui/format.js';
import { initialState, orchestrationReducer, type Action, type OrchestrationState } from '../ui/state.js';
import { readPromptInput } from './prompt-input.js';

interface AskOptions {
  file?: string;
  primary?: string;
  cwd?: string;
  json?: boolean;
  format?: string;
  output?: string;
  verbose?: boolean;
  quiet?: boolean;
}

function saveOutput(path: string | undefined, outcome: OrchestrationOutcome) {
  if (path && outcome.output) {
    writeFileSync(resolve(path), outcome.output, 'utf-8');
  }
}

async function runInteractive(ctx: CliContext, prompt: string, opts: AskOptions): Promise<void> {
  const { runtime } = ctx;
  let state: OrchestrationState = { ...initialState };
  const view = () => React.createElement(App, { state, primary: runtime.primary });
  const ink = inkRender(view());
  const dispatch = (action: Action) => {
    state = orchestrationReducer(state, action);
    ink.rerender(view());
  };
  const ticker = setInterval(() => ink.rerender(view()), 1000);

  const orchestrator = new Orchestrator({
    primary: runtime.primary,
    adapters: runtime.adapters,
    executor: runtime.executor,
    availableAgents: runtime.available,
    parallelTimeoutSeconds: ctx.config.parallelTimeout,
    events: createCallbackEventBridge({
      onStageChange: (stage, summary) => dispatch({ type: 'STAGE_CHANGE', stage, summary }),
      onPlan: (plan) => dispatch({ type: 'PLAN', plan }),
      onAgentStatus: (key, name, status) => dispatch({ type: 'AGENT_STATUS', key, name, status, at: Date.now() }),
      onComplete: (outcome) => dispatch({ type: 'COMPLETE', outcome }),
      onError: (error) => dispatch({ type: 'ERROR', error }),
    }),
  });

  try {
    const outcome = await orchestrator.execute(prompt);
    saveOutput(opts.output, outcome);
  } finally {
    clearInterval(ticker);
    ink.unmount();
    await ink.waitUntilExit();
  }
}

async function runPlain(ctx: CliContext, prompt: string, opts: AskOptions, format: OutputFormat): Promise<void> {
  const { runtime } = ctx;
  const showProgress = format !== 'json' && !opts.quiet;
  const formatter = createFormatter(format);

  const orchestrator = new Orchestrator({
    primary: runtime.primary,
    adapters: runtime.adapters,
    executor: runtime.executor,
    availableAgents: runtime.available,
    parallelTimeoutSeconds: ctx.config.parallelTimeout,
    events: createCallbackEventBridge({
      onStageChange: (stage, summary) => {
        if (showProgress && stage !== 'done') console.error(`\n  ${summary}...`);
      },
      onAgentStatus: (key, name, status) => {
        if (showProgress && status !== 'queued') console.error(`  ${statusIcon(status)} ${name} [${key}]: ${status}`);
      },
    }),
  });

  const outcome = await orchestrator.execute(prompt);
  console.log(formatter.formatOutcome(outcome));
  saveOutput(opts.output, outcome);
  if (opts.output && outcome.output && showProgress) {
    console.error(`\n  Saved to: ${opts.output}`);
  }
}

export function registerAskCommand(program: Command): void {
  program
    .command('ask', { isDefault: true })
    .description('Plan a task with the primary agent, delegate it, and synthesize one answer')
    .argument('[prompt...]', 'The task to orchestrate')
    .option('-f, --file <path>', 'Read prompt from file (- for stdin)')
    .option('-p, --primary <agent>', 'Primary (planning) agent for this run')
    .option('--cwd <path>', 'Working directory for the agents', process.cwd())
    .option('--json', 'Output the full outcome as JSON to stdout')
    .option('--format <type>', 'Output format: plain (default), md, json')
    .option('-o, --output <file>', 'Save the final answer to a file')
    .option('--verbose', 'Debug logging')
    .option('--quiet', 'Only print the final answer')
    .action(async (promptParts: string[], opts: AskOptions) => {
      setLogLevel(opts.verbose ? 'debug' : opts.quiet ? 'error' : 'warn');

      const prompt = readPromptInput(promptParts, opts.file);
      if (!prompt) {
        console.error('Error: No prompt provided. Use `neurones ask <prompt>` or `neurones ask -f <file>`');
        process.exit(1);
      }

      let requested: OutputFormat | undefined;
      try {
        requested = requestedFormat(opts);
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
      const format = requested ?? 'plain';
      const isInteractive = process.stdout.isTTY === true && requested === undefined && !opts.quiet;

      try {
        const ctx = await createCliContext({ primary: opts.primary, cwd: resolve(opts.cwd ?? process.cwd()) });
        if (isInteractive) {
          // info logs would tear Ink's frames
          if (!opts.verbose) setLogLevel('error');
          await runInteractive(ctx, prompt, opts);
        } else {
          await runPlain(ctx, prompt, opts, format);
        }
      } catch (err) {
        console.error(createFormatter(format).formatError(errorMessage(err)));
        process.exit(1);
      }
    });
}

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { AgentNotFoundError, setLogLevel } from '@neurones/core';
import { createCliContext, errorMessage } from '../context.js';
import { createFormatter, requestedFormat } from '../formatters/formatter.js';
import { readPromptInput } from './prompt-input.js';

interface RunOptions {
  file?: string;
  model?: string;
  stream?: boolean;
  cwd?: string;
  json?: boolean;
  format?: string;
  verbose?: boolean;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run one agent directly, without planning or synthesis')
    .argument('<agent>', 'Agent to run (claude, gemini, codex)')
    .argument('[prompt...]', 'The prompt to send')
    .option('-f, --file <path>', 'Read prompt from file (- for stdin)')
    .option('-m, --model <model>', 'Model override for this run')
    .option('--stream', 'Print output line by line as it arrives (no retries)')
    .option('--cwd <path>', 'Working directory for the agent', process.cwd())
    .option('--json', 'Output the result as JSON')
    .option('--format <type>', 'Output format: plain (default), md, json')
    .option('--verbose', 'Debug logging')
    .action(async (agent: string, promptParts: string[], opts: RunOptions) => {
      setLogLevel(opts.verbose ? 'debug' : 'warn');

      const prompt = readPromptInput(promptParts, opts.file);
      if (!prompt) {
        console.error('Error: No prompt provided. Use `neurones run <agent> <prompt>`');
        process.exit(1);
      }

      try {
        const formatter = createFormatter(requestedFormat(opts) ?? 'plain');
        const { runtime } = await createCliContext({ cwd: resolve(opts.cwd ?? process.cwd()) });
        if (!runtime.adapters.has(agent)) {
          throw new AgentNotFoundError(agent, runtime.available);
        }

        if (opts.stream) {
          for await (const line of runtime.executor.stream(agent, prompt, { model: opts.model })) {
            console.log(line);
          }
          return;
        }

        const result = await runtime.executor.runSingle(agent, prompt, { model: opts.model });
        console.log(formatter.formatResult(result));
        if (!result.success) process.exit(1);
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { Comparator, setLogLevel } from '@neurones/core';
import { createCliContext, errorMessage } from '../context.js';
import { createFormatter, requestedFormat } from '../formatters/formatter.js';
import { statusIcon } from '../ui/format.js';
import { parseAgentList, readPromptInput } from './prompt-input.js';

interface CompareOptions {
  file?: string;
  agents?: string;
  cwd?: string;
  json?: boolean;
  format?: string;
  verbose?: boolean;
}

export function registerCompareCommand(program: Command): void {
  program
    .command('compare')
    .description('Send the same prompt to several agents and show the results side by side')
    .argument('[prompt...]', 'The prompt to compare on')
    .option('-f, --file <path>', 'Read prompt from file (- for stdin)')
    .option('-a, --agents <list>', 'Comma-separated agents (default: every detected agent)')
    .option('--cwd <path>', 'Working directory for the agents', process.cwd())
    .option('--json', 'Output results as JSON')
    .option('--format <type>', 'Output format: plain (default), md, json')
    .option('--verbose', 'Debug logging')
    .action(async (promptParts: string[], opts: CompareOptions) => {
      setLogLevel(opts.verbose ? 'debug' : 'warn');

      const prompt = readPromptInput(promptParts, opts.file);
      if (!prompt) {
        console.error('Error: No prompt provided. Use `neurones compare <prompt>`');
        process.exit(1);
      }

      try {
        const format = requestedFormat(opts) ?? 'plain';
        const { runtime, config } = await createCliContext({ cwd: resolve(opts.cwd ?? process.cwd()) });
        const comparator = new Comparator({ executor: runtime.executor, agents: runtime.available });

        const results = await comparator.compare(prompt, parseAgentList(opts.agents), {
          timeoutCapSeconds: config.parallelTimeout,
          onStatus: (_index, agentName, status) => {
            if (format !== 'json' && status !== 'queued') console.error(`  ${statusIcon(status)} ${agentName}: ${status}`);
          },
        });

        console.log(createFormatter(format).formatComparison(prompt, results));
        if (results.length === 0) process.exit(1);
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}

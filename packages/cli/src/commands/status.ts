import type { Command } from 'commander';
import { setLogLevel } from '@neurones/core';
import { createConfigService, detectAgents, errorMessage } from '../context.js';
import { renderStatusTable } from '../formatters/table.js';

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show which agent CLIs are installed and which one is primary')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      setLogLevel('error');
      try {
        const config = await createConfigService().resolve();
        const detected = await detectAgents();
        const [firstDetected] = detected.keys();
        const primary = detected.has(config.primary) ? config.primary : firstDetected ?? null;

        if (opts.json) {
          console.log(JSON.stringify({ primary, configuredPrimary: config.primary, agents: [...detected.values()] }, null, 2));
          return;
        }

        console.log(`\n${renderStatusTable(detected, primary)}\n`);
        if (primary === null) {
          console.log('Install Claude Code, Gemini CLI or Codex CLI to get started.');
        } else if (primary !== config.primary) {
          console.log(`Primary: ${primary} (configured primary '${config.primary}' is not installed)`);
        } else {
          console.log(`Primary: ${primary}`);
        }
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}

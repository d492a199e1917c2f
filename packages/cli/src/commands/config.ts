import type { Command } from 'commander';
import type { AppConfig } from '@neurones/core';
import { createConfigService, errorMessage } from '../context.js';

function describeConfig(config: AppConfig): string {
  const lines = [
    '',
    '  Configuration:',
    `  Primary:           ${config.primary}`,
    `  Parallel timeout:  ${config.parallelTimeout}s`,
    `  JSON output:       ${config.jsonOutput}`,
    `  Retries:           ${config.retry.maxRetries} (base ${config.retry.baseDelaySeconds}s, max ${config.retry.maxDelaySeconds}s)`,
  ];
  for (const [name, agent] of Object.entries(config.agents)) {
    const extras = [
      agent.defaultModel ? `model=${agent.defaultModel}` : null,
      agent.maxTurns ? `max_turns=${agent.maxTurns}` : null,
      agent.binaryPath ? `path=${agent.binaryPath}` : null,
      agent.extraArgs.length > 0 ? `args=${agent.extraArgs.join(' ')}` : null,
    ].filter(Boolean);
    lines.push(
      `  ${`${name}:`.padEnd(19)}timeout=${agent.timeout}s auto_approve=${agent.autoApprove}${extras.length > 0 ? ' ' + extras.join(' ') : ''}`,
    );
  }
  lines.push('');
  return lines.join('\n');
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage configuration');

  config
    .command('show')
    .description('Show the effective configuration')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      try {
        const resolved = await createConfigService().resolve();
        console.log(opts.json ? JSON.stringify(resolved, null, 2) : describeConfig(resolved));
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    });

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', 'primary, parallel_timeout, json_output, max_retries, retry_base_delay, retry_max_delay, agents.<name>.<field>')
    .argument('<value>', 'Value to set')
    .action(async (key: string, value: string) => {
      try {
        await createConfigService().set(key, value);
        console.log(`${key} set to: ${value}`);
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    });

  config
    .command('reset')
    .description('Reset configuration to defaults')
    .action(async () => {
      await createConfigService().reset();
      console.log('Configuration reset to defaults.');
    });

  config
    .command('path')
    .description('Print the config file location')
    .action(() => {
      console.log(createConfigService().location);
    });
}

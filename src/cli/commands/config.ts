/**
 * `lats config`: show and initialise configuration.
 * `config show`: print the merged configuration as YAML
 * `config init`: write a default .lats.yaml into the project
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { stringify } from 'yaml';
import { ConfigManager } from '../../core/config.js';
import type { LatsConfig } from '../../core/types.js';

export function renderConfig(config: LatsConfig, json: boolean = false): string {
  return json ? JSON.stringify(config, null, 2) : stringify(config);
}

export function createConfigCommand(): Command {
  const cmd = new Command('config');

  cmd.description('Inspect LATS configuration');

  cmd
    .command('show')
    .description('Print the merged configuration')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .action((options: { dir: string; json?: boolean }) => {
      const manager = new ConfigManager(resolve(options.dir));
      console.log(renderConfig(manager.load(), options.json));
    });

  cmd
    .command('init')
    .description('Create a default .lats.yaml if none exists')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action((options: { dir: string }) => {
      const manager = new ConfigManager(resolve(options.dir));
      console.log(`Config: ${manager.createDefaultConfig()}`);
    });

  return cmd;
}

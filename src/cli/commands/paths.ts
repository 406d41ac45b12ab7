/**
 * `lats paths`: browse persisted winning paths.
 * `paths list`: list run files in the winning path directory
 * `paths show <file>`: print the records of one run file
 */

import { Command } from 'commander';
import { basename, resolve } from 'path';
import { ConfigManager } from '../../core/config.js';
import { WinningPathStore } from '../../memory/winning-path-store.js';
import type { WinningPath } from '../../reasoning/lats/winning-path.js';

export function renderWinningPath(path: WinningPath): string {
  const lines = [
    `  Run:        ${path.runId}`,
    `  Created:    ${path.createdAt}`,
    `  Problem:    ${path.problemDescription.substring(0, 80)}`,
    `  Type:       ${path.problemType}`,
    `  Strategy:   ${path.finalStrategyId} (q=${path.finalQValue.toFixed(3)}, ${path.reflectionVerdict})`,
    `  Iterations: ${path.totalIterations}, nodes: ${path.totalNodesExplored}`,
    `  Files:      ${Object.keys(path.finalCodeChanges).join(', ') || '(none)'}`,
    '  Thoughts:',
    ...path.thoughtSequence.map((thought, i) => `    ${i}. ${thought}`),
  ];
  return lines.join('\n');
}

function resolveDirectory(options: { dir?: string; project: string }): string {
  if (options.dir) return resolve(options.dir);
  const config = new ConfigManager(resolve(options.project)).load();
  return resolve(options.project, config.persistence.winningPathDir);
}

export function createPathsCommand(): Command {
  const cmd = new Command('paths');

  cmd.description('Browse winning paths saved by previous searches');

  cmd
    .command('list')
    .description('List winning path files')
    .option('--dir <directory>', 'Winning path directory (defaults to the configured one)')
    .option('-p, --project <directory>', 'Project directory', '.')
    .action(async (options: { dir?: string; project: string }) => {
      const store = new WinningPathStore(resolveDirectory(options));
      const files = await store.list();
      if (files.length === 0) {
        console.log(`No winning paths in ${store.getDirectory()}`);
        return;
      }
      for (const file of files) {
        console.log(basename(file));
      }
    });

  cmd
    .command('show <file>')
    .description('Print the records stored in a winning path file')
    .option('--json', 'Output raw records as JSON')
    .action(async (file: string, options: { json?: boolean }) => {
      const filePath = resolve(file);
      const store = new WinningPathStore(resolve(filePath, '..'));
      const paths = await store.read(filePath);

      if (options.json) {
        console.log(JSON.stringify(paths, null, 2));
        return;
      }
      console.log();
      console.log(paths.map(renderWinningPath).join('\n\n'));
      console.log();
    });

  return cmd;
}

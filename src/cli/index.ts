import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { runCommand } from './run.js';
import { initCommand } from './init.js';
import { statusCommand } from './status.js';

// package.json sits two levels up from src/cli, three from dist/src/cli
function readVersion(): string {
  for (const rel of ['../../package.json', '../../../package.json']) {
    const path = fileURLToPath(new URL(rel, import.meta.url));
    if (existsSync(path)) {
      const pkg: unknown = JSON.parse(readFileSync(path, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    }
  }
  return '0.0.0';
}

export const program = new Command();
program
  .name('revharvest')
  .description('Google Play review harvester: fetch, dedupe, append')
  .version(readVersion());

program.addCommand(runCommand);
program.addCommand(initCommand);
program.addCommand(statusCommand);

#!/usr/bin/env node
import { createRequire } from 'module';
import { Command } from 'commander';
import { createAnalyzeCommand } from './commands/analyze.js';
import { createInitCommand } from './commands/init.js';

// Get version from package.json (src/ in development, dist/src/ when built)
const require = createRequire(import.meta.url);
function readVersion(): string {
  for (const candidate of ['../package.json', '../../package.json']) {
    try {
      const pkg: unknown = require(candidate);
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    } catch (error: unknown) {
      if (!(error instanceof Error && 'code' in error && error.code === 'MODULE_NOT_FOUND')) throw error;
    }
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('modgraph')
  .description('Module dependency analysis: circular dependencies, god modules and layer violations')
  .version(readVersion());

program.addCommand(createAnalyzeCommand());
program.addCommand(createInitCommand());

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 2;
});

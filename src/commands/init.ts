/**
 * Init command: write the default `.modgraph.yaml` into a project
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { CONFIG_FILE_NAME, EXIT_CODES } from '../constants.js';
import { readDefaultTemplate } from '../utils/config-loader.js';
import { extractErrorMessage } from '../utils/error-handler.js';
import type { ExitCode } from './analyze.js';

export interface InitCommandOptions {
  force?: boolean;
}

export interface InitResult {
  readonly configPath: string;
  readonly created: boolean;
}

/**
 * Write the template unless a config already exists (or `force` is set)
 */
export function initProjectConfig(projectRoot: string, options: InitCommandOptions = {}): InitResult {
  const configPath = join(resolve(projectRoot), CONFIG_FILE_NAME);
  if (existsSync(configPath) && !options.force) {
    return { configPath, created: false };
  }
  writeFileSync(configPath, readDefaultTemplate(), 'utf-8');
  return { configPath, created: true };
}

export function runInit(projectArg: string | undefined, options: InitCommandOptions): ExitCode {
  try {
    const result = initProjectConfig(projectArg ?? process.cwd(), options);
    if (result.created) {
      console.log(chalk.green(`✓ Created ${result.configPath}`));
      console.log(chalk.gray('  Edit architecture.layers to match your project, then run `modgraph analyze`.'));
    } else {
      console.log(chalk.yellow(`Config already exists: ${result.configPath}`));
      console.log(chalk.gray('  Use --force to overwrite it.'));
    }
    return EXIT_CODES.CLEAN;
  } catch (error: unknown) {
    console.error(chalk.red(`Failed to write config: ${extractErrorMessage(error)}`));
    return EXIT_CODES.FAILURE;
  }
}

export function createInitCommand(): Command {
  return new Command('init')
    .description(`Create a ${CONFIG_FILE_NAME} with the default settings and layers`)
    .argument('[project]', 'Project directory (defaults to the current directory)')
    .option('-f, --force', 'Overwrite an existing config file', false)
    .action((project: string | undefined, options: InitCommandOptions) => {
      process.exitCode = runInit(project, options);
    });
}

import { Command } from 'commander';
import { existsSync, mkdirSync } from 'node:fs';
import { resolve } from 'node:path';
import { logger } from '../utils/logger.js';
import {
  CONFIG_FILENAME,
  findProjectRoot,
  isInitialized,
  saveConfig,
  ensureStateDir,
  getSwitchboardPaths,
} from '../utils/config.js';
import { DEFAULT_CONFIG } from '../../types/config.js';

interface InitOptions {
  force?: boolean;
  project?: string;
}

export const initCommand = new Command('init')
  .description('Write a default .switchboard.yaml and state directory')
  .option('-f, --force', 'Overwrite existing configuration')
  .option('-p, --project <path>', 'Path to the project directory (defaults to current directory)')
  .action(async (options: InitOptions) => {
    try {
      runInit(options);
    } catch (error) {
      if (error instanceof Error) {
        logger.error(error.message);
      }
      process.exit(1);
    }
  });

function runInit(options: InitOptions): void {
  const cwd = options.project ? resolve(options.project) : process.cwd();

  if (options.project && !existsSync(cwd)) {
    mkdirSync(cwd, { recursive: true });
    logger.info(`Created project directory: ${cwd}`);
  }

  // --project is taken as the root itself, without searching parents
  const projectRoot = options.project ? cwd : (findProjectRoot(cwd) ?? cwd);
  if (isInitialized(projectRoot) && !options.force) {
    logger.error(`${CONFIG_FILENAME} already exists. Use --force to overwrite it.`);
    process.exitCode = 1;
    return;
  }

  saveConfig(projectRoot, DEFAULT_CONFIG);
  ensureStateDir(projectRoot);

  const paths = getSwitchboardPaths(projectRoot);
  logger.success('Switchboard initialized');
  logger.keyValue('Config', paths.config);
  logger.keyValue('State', paths.stateDir);
  logger.blank();
  logger.info('Next: switchboard consult "<question>" --type <domain>');
}

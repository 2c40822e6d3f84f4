#!/usr/bin/env node

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { consultCommand } from './commands/consult.js';
import { agentsCommand } from './commands/agents.js';
import { statusCommand } from './commands/status.js';
import { strengthenCommand } from './commands/strengthen.js';
import { setLogLevel } from './utils/logger.js';

const program = new Command();

program
  .name('switchboard')
  .description('Route consultation requests to domain agents and strengthen story issues')
  .version('0.1.0')
  .option('-v, --verbose', 'Enable verbose logging')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.verbose) {
      setLogLevel('debug');
    }
  });

program.addCommand(initCommand);
program.addCommand(consultCommand);
program.addCommand(agentsCommand);
program.addCommand(statusCommand);
program.addCommand(strengthenCommand);

program.parse();

import { Command } from 'commander';
import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import { openSwitchboard } from '../utils/switchboard.js';

interface AgentsOptions {
  json?: boolean;
}

export const agentsCommand = new Command('agents')
  .description('List registered agents, optionally for one domain')
  .argument('[domain]', 'Only agents serving this domain')
  .option('--json', 'Print descriptors as JSON')
  .action(async (domain: string | undefined, options: AgentsOptions) => {
    try {
      runAgents(domain, options);
    } catch (error) {
      if (error instanceof Error) {
        logger.error(error.message);
      }
      process.exit(1);
    }
  });

function runAgents(domain: string | undefined, options: AgentsOptions): void {
  const { switchboard } = openSwitchboard();
  const descriptors = domain
    ? switchboard.registry.getAgentsForDomain(domain)
    : switchboard.registry.getAll();
  switchboard.shutdown();

  if (options.json) {
    logger.json(
      descriptors.map((descriptor) => ({
        ...descriptor,
        capabilities: [...descriptor.capabilities],
      }))
    );
    return;
  }

  if (descriptors.length === 0) {
    logger.warn(domain ? `No agents registered for domain '${domain}'` : 'No agents registered');
    return;
  }

  logger.section(domain ? `Agents for '${domain}'` : 'Agents');
  for (const descriptor of descriptors) {
    const state = descriptor.available ? chalk.green('available') : chalk.red('unavailable');
    logger.listItem(`${chalk.bold(descriptor.id)} [${descriptor.domain}] ${state}`);
    logger.info(chalk.dim(`    ${[...descriptor.capabilities].join(', ')}`));
  }
}

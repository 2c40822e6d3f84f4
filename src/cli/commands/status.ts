import { Command } from 'commander';
import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import { withSpinner } from '../utils/spinner.js';
import { formatRatio } from '../utils/format.js';
import { openSwitchboard } from '../utils/switchboard.js';

export const statusCommand = new Command('status')
  .description('Probe every agent once and show registry health and budgets')
  .action(async () => {
    try {
      await runStatus();
    } catch (error) {
      if (error instanceof Error) {
        logger.error(error.message);
      }
      process.exit(1);
    }
  });

async function runStatus(): Promise<void> {
  const { switchboard, projectRoot } = openSwitchboard();
  const { config, registry, healthMonitor } = switchboard;

  try {
    const results = await withSpinner('Probing agents...', () => healthMonitor.sweep(), {
      successText: (health) => `Probed ${health.length} agents`,
    });

    logger.blank();
    logger.info(chalk.bold('Switchboard Status'));
    logger.info(chalk.dim('═'.repeat(40)));
    logger.keyValue('Project', projectRoot);

    const status = registry.getHealthStatus();
    logger.section('Registry');
    logger.keyValue('Agents', status.totalAgents.toString());
    logger.keyValue('Available', formatRatio(status.availableAgents, status.totalAgents));
    logger.keyValue('Unhealthy', status.unhealthyAgents.toString());

    logger.section('Probes');
    for (const health of results) {
      const latency = health.latencyMs === null ? '-' : `${health.latencyMs}ms`;
      const mark = health.error ? chalk.red('✗') : chalk.green('✓');
      logger.info(`  ${mark} ${health.agentId} ${chalk.dim(latency)}${health.error ? ` ${chalk.red(health.error)}` : ''}`);
    }

    logger.section('Budgets');
    logger.keyValue('Discovery', `${config.dispatcher.discoveryBudgetMs}ms`);
    logger.keyValue('Consultation', `${config.dispatcher.consultationBudgetMs}ms`);
    logger.keyValue('Health probe', `${config.healthCheck.timeoutMs}ms`);
    logger.keyValue('Required permissions', config.dispatcher.requiredPermissions.join(', '));

    logger.section('Story pipeline');
    logger.keyValue('Loop detection', config.story.enableLoopDetection);
    logger.keyValue('Max rewrites', config.story.maxRewriteIterations.toString());
    logger.keyValue('Max acceptance criteria', config.story.maxAcceptanceCriteria.toString());
    logger.keyValue('Max open questions', config.story.maxOpenQuestions.toString());
  } finally {
    switchboard.shutdown();
  }
}

import chalk from 'chalk';
import type { AgentResponse } from '../../types/index.js';
import { logger } from './logger.js';

/**
 * Print a consultation response for humans
 */
export function printResponse(response: AgentResponse): void {
  if (response.success) {
    logger.success(`SUCCESS (confidence ${response.confidence.toFixed(2)})`);
  } else {
    logger.error(`FAILURE [${response.errorCategory ?? 'unknown'}] ${response.errorMessage ?? ''}`);
  }

  const agentId = response.context.agentId;
  if (typeof agentId === 'string') {
    logger.keyValue('Agent', agentId);
  }
  logger.keyValue('Time', `${response.processingTimeMs}ms`);

  if (response.success) {
    logger.section('Output');
    logger.info(response.output);
  } else if (typeof response.context.stopPhrase === 'string') {
    logger.section('Stopped');
    logger.info(chalk.yellow(response.output));
  }

  if (response.recommendations.length > 0) {
    logger.section('Recommendations');
    for (const recommendation of response.recommendations) {
      logger.listItem(recommendation);
    }
  }
}

/**
 * Render a fraction as "n/total (p%)"
 */
export function formatRatio(n: number, total: number): string {
  const percent = total === 0 ? 0 : (n / total) * 100;
  return `${n}/${total} (${percent.toFixed(0)}%)`;
}

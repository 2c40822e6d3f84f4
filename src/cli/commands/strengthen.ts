import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import { openSwitchboard } from '../utils/switchboard.js';
import { StoryIssueSchema } from '../../integrations/issue-store.js';

interface StrengthenOptions {
  save?: boolean;
  json?: boolean;
}

export const strengthenCommand = new Command('strengthen')
  .description('Run a story issue (JSON file) through the strengthening pipeline')
  .argument('<issueFile>', 'JSON file with number, title, body, labels, repository')
  .option('-s, --save', 'Keep the issue in the state directory')
  .option('--json', 'Print the processing result as JSON')
  .action(async (issueFile: string, options: StrengthenOptions) => {
    try {
      const ok = await runStrengthen(issueFile, options);
      if (!ok) {
        process.exitCode = 1;
      }
    } catch (error) {
      if (error instanceof Error) {
        logger.error(error.message);
      }
      process.exit(1);
    }
  });

async function runStrengthen(issueFile: string, options: StrengthenOptions): Promise<boolean> {
  const filePath = resolve(issueFile);
  const parsed = StoryIssueSchema.safeParse(JSON.parse(readFileSync(filePath, 'utf-8')));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid issue file ${filePath}: ${issues.join('; ')}`);
  }
  const issue = parsed.data;

  const { switchboard, issueStore } = openSwitchboard();
  switchboard.shutdown();

  if (options.save) {
    const id = await issueStore.create(issue);
    logger.debug(`Saved issue as ${id}`);
  }

  const result = switchboard.pipeline.processIssue(issue);

  if (options.json) {
    logger.json(result);
    return result.success;
  }

  if (result.success) {
    logger.info(result.output);
    return true;
  }

  logger.error(result.stopPhrase);
  logger.keyValue('Stage', result.stage);
  logger.keyValue('Reason', chalk.yellow(result.reason));
  return false;
}

import { createSwitchboard, type Switchboard } from '../../core/bootstrap.js';
import { FileIssueStore } from '../../integrations/issue-store.js';
import { findProjectRoot, getSwitchboardPaths, loadConfig } from './config.js';
import { logger } from './logger.js';

/**
 * Bootstrap a switchboard for the project around the working directory,
 * with progress routed to debug logging
 */
export function openSwitchboard(cwd: string = process.cwd()): {
  switchboard: Switchboard;
  projectRoot: string;
  issueStore: FileIssueStore;
} {
  const projectRoot = findProjectRoot(cwd) ?? cwd;
  const config = loadConfig(projectRoot, (message) => logger.warn(message));
  const issueStore = new FileIssueStore({
    stateDir: getSwitchboardPaths(projectRoot).stateDir,
  });

  logger.debug(`Project root: ${projectRoot}`);

  const switchboard = createSwitchboard(config, {
    issueStore,
    onProgress: (message) => logger.debug(message),
  });

  return { switchboard, projectRoot, issueStore };
}

import { Command } from 'commander';
import { userInfo } from 'node:os';
import { logger } from '../utils/logger.js';
import { withSpinner } from '../utils/spinner.js';
import { printResponse } from '../utils/format.js';
import { collect, parseList, parseProperties } from '../utils/properties.js';
import { openSwitchboard } from '../utils/switchboard.js';
import { PERMISSIONS } from '../../types/index.js';

interface ConsultOptions {
  type?: string;
  domain?: string;
  property: string[];
  permissions?: string;
  token?: string;
  user?: string;
  json?: boolean;
}

export const consultCommand = new Command('consult')
  .description('Send a consultation request to the best matching agent')
  .argument('<description>', 'What you want advice on')
  .option('-t, --type <type>', 'Request type (defaults to the domain, or "general")')
  .option('-d, --domain <domain>', 'Domain hint used for agent scoring')
  .option('-P, --property <key=value>', 'Context property (repeatable)', collect, [])
  .option('--permissions <list>', 'Comma-separated permissions to grant (defaults to all)')
  .option('--token <token>', 'Credential token (defaults to $SWITCHBOARD_TOKEN)')
  .option('--user <id>', 'User id (defaults to the OS user)')
  .option('--json', 'Print the raw response as JSON')
  .action(async (description: string, options: ConsultOptions) => {
    try {
      const ok = await runConsult(description, options);
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

async function runConsult(description: string, options: ConsultOptions): Promise<boolean> {
  const properties = parseProperties(options.property);
  const domain = options.domain ?? '';
  const type = options.type ?? (domain || 'general');
  const permissions = options.permissions ? parseList(options.permissions) : [...PERMISSIONS];

  const { switchboard } = openSwitchboard();

  try {
    const response = await withSpinner(
      `Consulting on '${type}'...`,
      () =>
        switchboard.processRequest({
          description,
          type,
          context: { domain, properties },
          securityContext: {
            token: options.token ?? process.env.SWITCHBOARD_TOKEN ?? 'local-cli',
            userId: options.user ?? userInfo().username,
            permissions,
          },
        }),
      {
        successText: (result) =>
          result.success ? 'Consultation complete' : 'Consultation returned a failure',
        enabled: !options.json,
      }
    );

    if (options.json) {
      logger.json(response);
    } else {
      printResponse(response);
    }
    return response.success;
  } finally {
    switchboard.shutdown();
  }
}

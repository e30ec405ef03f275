import { Command } from 'commander';
import { registerConfluenceCommands } from './commands/confluence.js';
import { registerJiraCommands } from './commands/jira.js';
import { registerRedshiftCommands } from './commands/redshift.js';
import { envServices, type CliServices } from './command.js';

export const VERSION = '0.1.0';

export function createProgram(services: CliServices = envServices): Command {
  const program = new Command();

  program
    .name('opsbridge')
    .description('opsbridge — Jira, Confluence and Redshift from the command line')
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Suppress non-essential logs', false)
    .option('--verbose', 'Show additional context', false)
    .option('--debug', 'Show internal error details and stacks', false)
    .showHelpAfterError('(run with --help for usage)')
    .helpOption('-h, --help', 'display help')
    .version(VERSION, '-v, --version', 'Show version number');

  program.exitOverride();
  program.addHelpText(
    'after',
    `
Command groups:
  jira        issues, transitions, comments, history
  confluence  pages, comments, attachments, PDF export
  redshift    tables, columns, queries with schema context

Configuration is read from the environment and from .env in the working directory.
`,
  );

  registerJiraCommands(program, services);
  registerConfluenceCommands(program, services);
  registerRedshiftCommands(program, services);

  return program;
}

import type { Command } from 'commander';
import { decodeEscapes, openIssuesOnly, sortIssues, type IssueSortField, type SortOrder } from '@opsbridge/core';
import { runtimeError } from '../errors.js';
import { printCommandSuccess, printHuman, printHumanTable, printResult, withOutputFlags } from '../output.js';
import { parseChoice, runCommand, withExamples, type CliServices } from '../command.js';

const SORT_FIELDS: readonly IssueSortField[] = ['created', 'updated'];
const SORT_ORDERS: readonly SortOrder[] = ['asc', 'desc'];

interface MyIssuesOptions {
  status?: string;
  priority?: string;
  sort: string;
  order: string;
}

export function registerJiraCommands(program: Command, services: CliServices): void {
  const jira = program.command('jira').description('Jira issues assigned to you and your projects');

  withExamples(
    withOutputFlags(
      jira
        .command('get-my-issues')
        .description('List open issues assigned to you')
        .option('--status <status>', 'Only issues in this status')
        .option('--priority <priority>', 'Only issues with this priority')
        .option('--sort <field>', 'Sort field: created or updated', 'created')
        .option('--order <order>', 'Sort order: asc or desc', 'asc')
        .action(async function (this: Command, opts: MyIssuesOptions) {
          await runCommand(this, async (output) => {
            const field = parseChoice(opts.sort, SORT_FIELDS, '--sort');
            const order = parseChoice(opts.order, SORT_ORDERS, '--order');
            const issues = await services.jira().getMyIssues({ status: opts.status, priority: opts.priority });
            printResult(sortIssues(openIssuesOnly(issues), field, order), output, 'No open issues assigned to you.');
          });
        }),
    ),
    ['opsbridge jira get-my-issues', 'opsbridge jira get-my-issues --priority High --sort updated --order desc --json'],
  );

  withExamples(
    withOutputFlags(
      jira
        .command('get-issue')
        .description('Show issue details, comments and links')
        .requiredOption('--issue-key <key>', 'Issue key')
        .action(async function (this: Command, opts: { issueKey: string }) {
          await runCommand(this, async (output) => {
            printResult(await services.jira().getIssueDetails(opts.issueKey), output);
          });
        }),
    ),
    ['opsbridge jira get-issue --issue-key OPS-42'],
  );

  withOutputFlags(
    jira
      .command('get-overdue')
      .description('List your unresolved issues past their due date')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          printResult(await services.jira().getOverdueIssues(), output, 'No overdue issues.');
        });
      }),
  );

  withExamples(
    withOutputFlags(
      jira
        .command('get-sprint-issues')
        .description('List issues in the open sprints of a project')
        .requiredOption('--project <key>', 'Project key')
        .action(async function (this: Command, opts: { project: string }) {
          await runCommand(this, async (output) => {
            printResult(await services.jira().getSprintIssues(opts.project), output, 'No issues in open sprints.');
          });
        }),
    ),
    ['opsbridge jira get-sprint-issues --project OPS'],
  );

  withOutputFlags(
    jira
      .command('get-related-issues')
      .description('List issues linked to an issue')
      .requiredOption('--issue-key <key>', 'Issue key')
      .action(async function (this: Command, opts: { issueKey: string }) {
        await runCommand(this, async (output) => {
          printResult(await services.jira().getRelatedIssues(opts.issueKey), output, 'No linked issues.');
        });
      }),
  );

  withExamples(
    withOutputFlags(
      jira
        .command('update-status')
        .description('Move an issue through the transition with the given name')
        .requiredOption('--issue-key <key>', 'Issue key')
        .requiredOption('--status <status>', 'Target status (transition name)')
        .action(async function (this: Command, opts: { issueKey: string; status: string }) {
          await runCommand(this, async (output) => {
            const moved = await services.jira().updateIssueStatus(opts.issueKey, opts.status);
            if (!moved) {
              throw runtimeError(
                `No transition to "${opts.status}" is available for ${opts.issueKey}.`,
                'TRANSITION_UNAVAILABLE',
              );
            }
            printCommandSuccess(
              { issueKey: opts.issueKey, status: opts.status },
              output,
              `Updated ${opts.issueKey} to status: ${opts.status}`,
            );
          });
        }),
    ),
    ['opsbridge jira update-status --issue-key OPS-42 --status "In Review"'],
  );

  withExamples(
    withOutputFlags(
      jira
        .command('create-issue')
        .description('Create an issue')
        .requiredOption('--project <key>', 'Project key')
        .requiredOption('--summary <text>', 'Issue summary')
        .requiredOption('--description <text>', 'Issue description')
        .option('--issue-type <type>', 'Issue type', 'Task')
        .action(async function (
          this: Command,
          opts: { project: string; summary: string; description: string; issueType: string },
        ) {
          await runCommand(this, async (output) => {
            const created = await services
              .jira()
              .createIssue(opts.project, opts.summary, opts.description, opts.issueType);
            printCommandSuccess(created, output, `Created issue ${created.key}`);
          });
        }),
    ),
    ['opsbridge jira create-issue --project OPS --summary "Rotate keys" --description "Quarterly rotation"'],
  );

  withExamples(
    withOutputFlags(
      jira
        .command('update-description')
        .description('Replace an issue description; \\n in the text becomes a newline')
        .requiredOption('--issue-key <key>', 'Issue key')
        .requiredOption('--description <text>', 'New description')
        .action(async function (this: Command, opts: { issueKey: string; description: string }) {
          await runCommand(this, async (output) => {
            const client = services.jira();
            await client.updateIssueDescription(opts.issueKey, opts.description);
            const details = await client.getIssueDetails(opts.issueKey);
            if (!output.json) {
              printHuman(`Updated description for ${opts.issueKey}`, output);
            }
            printResult(details, output);
          });
        }),
    ),
    ['opsbridge jira update-description --issue-key OPS-42 --description "Steps:\\n1. Log in"'],
  );

  withExamples(
    withOutputFlags(
      jira
        .command('add-comment')
        .description('Comment on an issue; \\n, \\t and \\\\ escapes are decoded')
        .requiredOption('--issue-key <key>', 'Issue key')
        .requiredOption('--comment <text>', 'Comment text')
        .action(async function (this: Command, opts: { issueKey: string; comment: string }) {
          await runCommand(this, async (output) => {
            const comment = await services.jira().addComment(opts.issueKey, decodeEscapes(opts.comment));
            printCommandSuccess(comment, output, `Added comment to ${opts.issueKey}`);
          });
        }),
    ),
    ['opsbridge jira add-comment --issue-key OPS-42 --comment "Deployed to staging\\nVerified"'],
  );

  withOutputFlags(
    jira
      .command('get-history')
      .description('Show the change history of an issue')
      .requiredOption('--issue-key <key>', 'Issue key')
      .action(async function (this: Command, opts: { issueKey: string }) {
        await runCommand(this, async (output) => {
          printResult(await services.jira().getIssueHistory(opts.issueKey), output, 'No changes recorded.');
        });
      }),
  );

  withOutputFlags(
    jira
      .command('get-metrics')
      .description('Show time tracking and key dates of an issue')
      .requiredOption('--issue-key <key>', 'Issue key')
      .action(async function (this: Command, opts: { issueKey: string }) {
        await runCommand(this, async (output) => {
          printResult(await services.jira().getIssueMetrics(opts.issueKey), output);
        });
      }),
  );

  withOutputFlags(
    jira
      .command('list-projects')
      .description('List the projects you can see')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const projects = await services.jira().getAllProjects();
          if (output.json) {
            printCommandSuccess(projects, output);
            return;
          }
          printHumanTable(
            ['key', 'name', 'id'],
            projects.map((p) => ({ key: p.key, name: p.name, id: p.id })),
            output,
          );
        });
      }),
  );
}

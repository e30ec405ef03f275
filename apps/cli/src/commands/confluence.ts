import type { Command } from 'commander';
import { runtimeError } from '../errors.js';
import { printCommandSuccess, printResult, printWarning, withOutputFlags, type OutputOptions } from '../output.js';
import { parsePositiveInt, runCommand, withExamples, type CliServices } from '../command.js';

const PAGE_ID = ['--page-id <id>', 'Page ID'] as const;

export function registerConfluenceCommands(program: Command, services: CliServices): void {
  const confluence = program.command('confluence').description('Confluence pages, comments and attachments');
  const client = (output: OutputOptions) => services.confluence((message) => printWarning(message, output));

  withOutputFlags(
    confluence
      .command('get-page')
      .description('Show a page with its storage-format body')
      .requiredOption(...PAGE_ID)
      .action(async function (this: Command, opts: { pageId: string }) {
        await runCommand(this, async (output) => {
          printResult(await client(output).getPage(opts.pageId), output);
        });
      }),
  );

  withExamples(
    withOutputFlags(
      confluence
        .command('create-page')
        .description('Create a page in your personal space')
        .requiredOption('--space-key <key>', 'Space key (must be your personal space)')
        .requiredOption('--title <title>', 'Page title')
        .requiredOption('--body <xhtml>', 'Page body in storage format')
        .option('--parent-id <id>', 'Parent page ID')
        .action(async function (
          this: Command,
          opts: { spaceKey: string; title: string; body: string; parentId?: string },
        ) {
          await runCommand(this, async (output) => {
            const page = await client(output).createPage(opts.spaceKey, opts.title, opts.body, opts.parentId);
            printCommandSuccess(page, output, `Created page ${page.id}: ${page.title}`);
          });
        }),
    ),
    ['opsbridge confluence create-page --space-key ~dev --title "Notes" --body "<p>Hello</p>"'],
  );

  withOutputFlags(
    confluence
      .command('update-page')
      .description('Replace the title and body of a page')
      .requiredOption(...PAGE_ID)
      .requiredOption('--title <title>', 'Page title')
      .requiredOption('--body <xhtml>', 'Page body in storage format')
      .action(async function (this: Command, opts: { pageId: string; title: string; body: string }) {
        await runCommand(this, async (output) => {
          const page = await client(output).updatePage(opts.pageId, opts.title, opts.body);
          printCommandSuccess(page, output, `Updated page ${page.id} to version ${page.version?.number ?? '?'}`);
        });
      }),
  );

  withOutputFlags(
    confluence
      .command('delete-page')
      .description('Delete a page')
      .requiredOption(...PAGE_ID)
      .action(async function (this: Command, opts: { pageId: string }) {
        await runCommand(this, async (output) => {
          await client(output).deletePage(opts.pageId);
          printCommandSuccess({ pageId: opts.pageId, deleted: true }, output, `Deleted page ${opts.pageId}`);
        });
      }),
  );

  withOutputFlags(
    confluence
      .command('get-children')
      .description('List the child pages of a page')
      .requiredOption(...PAGE_ID)
      .action(async function (this: Command, opts: { pageId: string }) {
        await runCommand(this, async (output) => {
          printResult(await client(output).getPageChildren(opts.pageId), output);
        });
      }),
  );

  withExamples(
    withOutputFlags(
      confluence
        .command('search')
        .description('Search content with CQL')
        .requiredOption('--query <cql>', 'CQL query')
        .option('--limit <n>', 'Maximum results', '25')
        .action(async function (this: Command, opts: { query: string; limit: string }) {
          await runCommand(this, async (output) => {
            const limit = parsePositiveInt(opts.limit, '--limit');
            printResult(
              await client(output).searchContent(opts.query, limit),
              output,
            );
          });
        }),
    ),
    ['opsbridge confluence search --query \'type = page AND text ~ "runbook"\''],
  );

  withOutputFlags(
    confluence
      .command('get-space-content')
      .description('List pages in a space')
      .requiredOption('--space-key <key>', 'Space key')
      .option('--limit <n>', 'Maximum results', '100')
      .action(async function (this: Command, opts: { spaceKey: string; limit: string }) {
        await runCommand(this, async (output) => {
          const limit = parsePositiveInt(opts.limit, '--limit');
          printResult(
            await client(output).getSpaceContent(opts.spaceKey, limit),
            output,
          );
        });
      }),
  );

  withOutputFlags(
    confluence
      .command('add-comment')
      .description('Comment on a page')
      .requiredOption(...PAGE_ID)
      .requiredOption('--comment <xhtml>', 'Comment body in storage format')
      .action(async function (this: Command, opts: { pageId: string; comment: string }) {
        await runCommand(this, async (output) => {
          const comment = await client(output).addComment(opts.pageId, opts.comment);
          printCommandSuccess(comment, output, `Added comment ${comment.id} to page ${opts.pageId}`);
        });
      }),
  );

  withOutputFlags(
    confluence
      .command('get-comments')
      .description('List the comments on a page')
      .requiredOption(...PAGE_ID)
      .action(async function (this: Command, opts: { pageId: string }) {
        await runCommand(this, async (output) => {
          printResult(await client(output).getPageComments(opts.pageId), output);
        });
      }),
  );

  withOutputFlags(
    confluence
      .command('list-spaces')
      .description('List the spaces you can see')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          printResult(await client(output).getSpaceList(), output);
        });
      }),
  );

  withOutputFlags(
    confluence
      .command('attach-file')
      .description('Upload a file as an attachment of a page')
      .requiredOption(...PAGE_ID)
      .requiredOption('--file-path <path>', 'File to upload')
      .action(async function (this: Command, opts: { pageId: string; filePath: string }) {
        await runCommand(this, async (output) => {
          const attachment = await client(output).attachFile(opts.pageId, opts.filePath);
          printCommandSuccess(attachment, output, `Attached ${attachment.title} to page ${opts.pageId}`);
        });
      }),
  );

  withOutputFlags(
    confluence
      .command('get-attachments')
      .description('List the attachments of a page')
      .requiredOption(...PAGE_ID)
      .action(async function (this: Command, opts: { pageId: string }) {
        await runCommand(this, async (output) => {
          printResult(await client(output).getAttachments(opts.pageId), output);
        });
      }),
  );

  withExamples(
    withOutputFlags(
      confluence
        .command('export-pdf')
        .description('Save a page as a PDF file')
        .requiredOption(...PAGE_ID)
        .requiredOption('--file-path <path>', 'Output file')
        .action(async function (this: Command, opts: { pageId: string; filePath: string }) {
          await runCommand(this, async (output) => {
            const saved = await client(output).exportPageAsPdf(opts.pageId, opts.filePath);
            if (!saved) {
              throw runtimeError(`Page ${opts.pageId} was not exported.`, 'PDF_EXPORT_FAILED');
            }
            printCommandSuccess(
              { pageId: opts.pageId, filePath: opts.filePath },
              output,
              `Saved page ${opts.pageId} to ${opts.filePath}`,
            );
          });
        }),
    ),
    ['opsbridge confluence export-pdf --page-id 123456 --file-path runbook.pdf'],
  );
}

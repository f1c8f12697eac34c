import fs from 'node:fs';
import path from 'node:path';

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import type {
  CandidateDisplayOptions,
  ComposedQuery,
  CreationArgs,
  Logger,
  NoteQueryContext,
  RecentBy,
} from '@zk-query/core';
import {
  CommandInvoker,
  NotBoundError,
  ZK_COMMANDS,
  buildBacklinkOptions,
  buildLinkOptions,
  buildListOptions,
  buildOrphanOptions,
  buildRecentOptions,
  createNote,
  createVocabularyTagPrompter,
  defineCreationShortcut,
  describeError,
  insertLink,
  isNotebookDocument,
  isZkError,
  normalizeTagRecords,
  queryNotes,
} from '@zk-query/core';

import type { ZkQueryConfig } from './config';
import { ConfigError, loadConfig } from './config';
import type { OpenPath } from './opener';
import { createOpener } from './opener';
import type { Prompter } from './prompt';
import { createReadlinePrompter } from './prompt';
import type { SessionFactory } from './sessions';
import { NotebookSessions, createLspSessionFactory } from './sessions';
import { parseTemplateVariables } from './templateVariables';

export const EXIT_OK = 0;
export const EXIT_USAGE = 2;
export const EXIT_CONFIG = 3;
export const EXIT_REMOTE_ERROR = 4;
export const EXIT_UNKNOWN_ERROR = 1;

const DISPLAY_FIELDS = ['tags', 'created', 'modified'] as const;
type DisplayField = (typeof DISPLAY_FIELDS)[number];

export interface CliOutput {
  write(chunk: string): unknown;
}

export interface CliEnvironment {
  cwd: string;
  stdout: CliOutput;
  stderr: CliOutput;
  logger: Logger;
  prompter: Prompter;
  loadConfig: (cwd: string) => ZkQueryConfig;
  createSessionFactory: (config: ZkQueryConfig, logger: Logger) => SessionFactory;
  createOpener: (config: ZkQueryConfig, stdout: CliOutput) => OpenPath;
}

interface CommandContext extends NoteQueryContext {
  config: ZkQueryConfig;
  invoker: CommandInvoker;
  openPath: OpenPath;
  logger: Logger;
}

interface GlobalArgs {
  document?: string;
  json: boolean;
}

class CliExitError extends Error {
  readonly exitCode: number;

  constructor(exitCode: number, message: string) {
    super(message);
    this.exitCode = exitCode;
  }
}

function defaultEnvironment(): CliEnvironment {
  return {
    cwd: process.cwd(),
    stdout: process.stdout,
    stderr: process.stderr,
    logger: console,
    prompter: createReadlinePrompter(),
    loadConfig,
    createSessionFactory: (config, logger) =>
      createLspSessionFactory({ command: config.server.command, args: config.server.args, logger }),
    createOpener: (config, stdout) =>
      createOpener({ ...(config.editor ? { editor: config.editor } : {}), stdout }),
  };
}

function isDisplayField(value: string): value is DisplayField {
  return (DISPLAY_FIELDS as readonly string[]).includes(value);
}

function isRecentBy(value: string): value is RecentBy {
  return value === 'created' || value === 'modified';
}

function resolveDisplay(
  config: ZkQueryConfig,
  show: string[] | undefined,
): CandidateDisplayOptions {
  if (!show) {
    return config.display;
  }
  const fields = new Set<DisplayField>();
  for (const entry of show) {
    for (const field of entry.split(',')) {
      const trimmed = field.trim();
      if (!trimmed) continue;
      if (!isDisplayField(trimmed)) {
        throw new CliExitError(EXIT_USAGE, `Unknown display field: ${trimmed}`);
      }
      fields.add(trimmed);
    }
  }
  return {
    includeTags: fields.has('tags'),
    includeCreated: fields.has('created'),
    includeModified: fields.has('modified'),
  };
}

function isDirectory(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory();
  } catch {
    return false;
  }
}

function printJson(stdout: CliOutput, value: unknown): void {
  stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

export async function runCli(
  options: { argv?: string[]; env?: Partial<CliEnvironment> } = {},
): Promise<number> {
  const env: CliEnvironment = { ...defaultEnvironment(), ...(options.env ?? {}) };
  const { stdout, stderr } = env;

  const resolveDocument = (value: string | undefined): string | undefined => {
    if (value === undefined) {
      return env.cwd;
    }
    const trimmed = value.trim();
    return trimmed ? path.resolve(env.cwd, trimmed) : undefined;
  };

  const withContext = async (
    argv: GlobalArgs,
    action: (context: CommandContext) => Promise<void>,
  ): Promise<void> => {
    const config = env.loadConfig(env.cwd);
    const documentPath = resolveDocument(argv.document);
    if (documentPath !== undefined && !isNotebookDocument(documentPath)) {
      throw new CliExitError(EXIT_CONFIG, `Not in a zk notebook: ${documentPath}`);
    }
    const sessions = new NotebookSessions(
      env.createSessionFactory(config, env.logger),
      env.logger,
    );
    const context: CommandContext = {
      config,
      invoker: new CommandInvoker(sessions),
      documentPath,
      openPath: env.createOpener(config, stdout),
      logger: env.logger,
    };
    try {
      await action(context);
    } finally {
      await sessions.closeAll();
    }
  };

  const presentQuery = async (
    context: CommandContext,
    argv: GlobalArgs & { pick?: boolean; show?: string[] },
    query: ComposedQuery,
  ): Promise<void> => {
    const outcome = await queryNotes(context, query, resolveDisplay(context.config, argv.show));
    if (outcome.status === 'failed') {
      throw new CliExitError(EXIT_REMOTE_ERROR, outcome.message);
    }
    if (outcome.status === 'empty') {
      if (argv.json) {
        printJson(stdout, outcome.candidates);
      }
      stderr.write(`${outcome.message} (${outcome.description})\n`);
      return;
    }
    if (argv.json) {
      printJson(stdout, outcome.candidates);
      return;
    }
    if (argv.pick) {
      const choice = await env.prompter.select(outcome.candidates);
      if (choice) {
        await context.openPath(choice.path);
      }
      return;
    }
    stderr.write(`${outcome.description} (${outcome.candidates.length} notes)\n`);
    for (const candidate of outcome.candidates) {
      stdout.write(`${candidate.display}\t${candidate.path}\n`);
    }
  };

  const openOrAbort = async (context: CommandContext, notePath: string | undefined) => {
    if (!notePath) {
      throw new CliExitError(EXIT_REMOTE_ERROR, 'Note creation failed');
    }
    await context.openPath(notePath);
  };

  try {
    const parser = yargs(options.argv ?? hideBin(process.argv))
      .scriptName('zkq')
      .usage('Usage: $0 <command> [options]')
      .option('document', {
        alias: 'd',
        type: 'string',
        describe: 'Document the commands run against (defaults to the working directory)',
      })
      .option('json', {
        type: 'boolean',
        default: false,
        describe: 'Output JSON',
      })
      .exitProcess(false)
      .fail((msg: string, err: Error | undefined) => {
        if (err) {
          throw err;
        }
        throw new CliExitError(
          EXIT_USAGE,
          msg || 'Invalid command usage. Run with --help for usage.',
        );
      })
      .command(
        'index',
        'Re-index the notebook',
        (args) => args,
        (argv) =>
          withContext(argv, async (context) => {
            const result = await context.invoker.indexNotebook(context.documentPath);
            printJson(stdout, result ?? null);
          }),
      )
      .command(
        'notes [query]',
        'Search notes by text, optionally filtered by tags',
        (args) =>
          args
            .positional('query', { type: 'string', default: '', describe: 'Free-text query' })
            .option('tags', {
              alias: 't',
              type: 'boolean',
              default: false,
              describe: 'Choose tags to filter by',
            })
            .option('limit', { type: 'number', describe: 'Maximum number of notes' })
            .option('pick', { type: 'boolean', default: false, describe: 'Pick a note to open' })
            .option('show', {
              type: 'string',
              array: true,
              describe: `Fields shown after titles (${DISPLAY_FIELDS.join(', ')})`,
            }),
        (argv) =>
          withContext(argv, async (context) => {
            const tagPrompter = createVocabularyTagPrompter({
              invoker: context.invoker,
              documentPath: context.documentPath,
              select: (vocabulary) => env.prompter.multiSelect(vocabulary),
            });
            const query = await buildListOptions(argv.query, argv.tags, tagPrompter);
            if (argv.limit !== undefined) {
              query.options.limit = argv.limit;
            }
            await presentQuery(context, argv, query);
          }),
      )
      .command(
        'recent',
        'List recently created or modified notes',
        (args) =>
          args
            .option('by', { type: 'string', default: 'modified', describe: 'created or modified' })
            .option('limit', { type: 'number', describe: 'Maximum number of notes' })
            .option('since', { type: 'string', describe: 'Only notes changed after this date' })
            .option('pick', { type: 'boolean', default: false, describe: 'Pick a note to open' })
            .option('show', { type: 'string', array: true, describe: 'Fields shown after titles' }),
        (argv) =>
          withContext(argv, async (context) => {
            if (!isRecentBy(argv.by)) {
              throw new CliExitError(
                EXIT_USAGE,
                `--by must be created or modified, got ${argv.by}`,
              );
            }
            const query = buildRecentOptions({
              by: argv.by,
              ...(argv.limit !== undefined ? { limit: argv.limit } : {}),
              ...(argv.since ? { since: argv.since } : {}),
            });
            await presentQuery(context, { ...argv, show: argv.show ?? [argv.by] }, query);
          }),
      )
      .command(
        'backlinks <note>',
        'List notes linking to a note',
        (args) =>
          args
            .positional('note', { type: 'string', demandOption: true })
            .option('pick', { type: 'boolean', default: false })
            .option('show', { type: 'string', array: true }),
        (argv) =>
          withContext(argv, async (context) => {
            const query = buildBacklinkOptions(path.resolve(env.cwd, argv.note));
            await presentQuery(context, argv, query);
          }),
      )
      .command(
        'links <note>',
        'List notes a note links to',
        (args) =>
          args
            .positional('note', { type: 'string', demandOption: true })
            .option('pick', { type: 'boolean', default: false })
            .option('show', { type: 'string', array: true }),
        (argv) =>
          withContext(argv, async (context) => {
            const query = buildLinkOptions(path.resolve(env.cwd, argv.note));
            await presentQuery(context, argv, query);
          }),
      )
      .command(
        'orphans',
        'List notes nothing links to',
        (args) =>
          args
            .option('pick', { type: 'boolean', default: false })
            .option('show', { type: 'string', array: true }),
        (argv) =>
          withContext(argv, async (context) => {
            await presentQuery(context, argv, buildOrphanOptions());
          }),
      )
      .command(
        'tags',
        'List tags by note count',
        (args) => args,
        (argv) =>
          withContext(argv, async (context) => {
            const result = await context.invoker.invoke(
              ZK_COMMANDS.tagList,
              { sort: ['note-count-'] },
              context.documentPath,
            );
            const tags = normalizeTagRecords(result);
            if (argv.json) {
              printJson(stdout, tags);
              return;
            }
            for (const tag of tags) {
              stdout.write(`${tag.name}\t${tag.noteCount}\n`);
            }
          }),
      )
      .command(
        'new [title]',
        'Create a note and open it',
        (args) =>
          args
            .positional('title', { type: 'string', describe: 'Note title' })
            .option('dir', { type: 'string', describe: 'Directory relative to the notebook' })
            .option('group', { type: 'string', describe: 'Note group from the notebook config' })
            .option('template', { type: 'string', describe: 'Template file' })
            .option('content', { type: 'string', describe: 'Initial content' })
            .option('extra', {
              type: 'string',
              array: true,
              describe: 'Template variables as key=value',
            }),
        (argv) =>
          withContext(argv, async (context) => {
            const extra = parseTemplateVariables(argv.extra);
            const args: CreationArgs = {
              ...(argv.title !== undefined ? { title: argv.title } : {}),
              ...(argv.dir !== undefined ? { dir: argv.dir } : {}),
              ...(argv.group !== undefined ? { group: argv.group } : {}),
              ...(argv.template !== undefined ? { template: argv.template } : {}),
              ...(argv.content !== undefined ? { content: argv.content } : {}),
              ...(Object.keys(extra).length > 0 ? { extra } : {}),
            };
            await openOrAbort(context, await createNote(context, args));
          }),
      )
      .command(
        'shortcut <name> [title]',
        'Create a note from a configured shortcut',
        (args) =>
          args
            .positional('name', { type: 'string', demandOption: true })
            .positional('title', { type: 'string' }),
        (argv) =>
          withContext(argv, async (context) => {
            const preset = context.config.shortcuts[argv.name];
            if (!preset) {
              const known = Object.keys(context.config.shortcuts).join(', ') || 'none';
              throw new CliExitError(
                EXIT_USAGE,
                `Unknown shortcut: ${argv.name} (known: ${known})`,
              );
            }
            const shortcut = defineCreationShortcut(argv.name, preset, context);
            if (shortcut.arity === 0) {
              await shortcut.run();
              return;
            }
            const title = argv.title ?? (await env.prompter.text('Title: '));
            await shortcut.run(title);
          }),
      )
      .command(
        'shortcuts',
        'List configured creation shortcuts',
        (args) => args,
        (argv) =>
          withContext(argv, async (context) => {
            if (argv.json) {
              printJson(stdout, context.config.shortcuts);
              return;
            }
            for (const [name, preset] of Object.entries(context.config.shortcuts)) {
              stdout.write(`${name}\t${JSON.stringify(preset)}\n`);
            }
          }),
      )
      .command(
        'link',
        'Insert a link to a picked note into the document',
        (args) =>
          args
            .demandOption('document')
            .option('line', { type: 'number', default: 1, describe: 'Cursor line (1-based)' })
            .option('column', { type: 'number', default: 1, describe: 'Cursor column (1-based)' }),
        (argv) =>
          withContext(argv, async (context) => {
            if (context.documentPath && isDirectory(context.documentPath)) {
              throw new NotBoundError(`${context.documentPath} is a directory, not a document`);
            }
            const outcome = await insertLink({
              ...context,
              line: Math.max(0, Math.trunc(argv.line) - 1),
              column: Math.max(0, Math.trunc(argv.column) - 1),
              pick: (candidates) => env.prompter.select(candidates),
            });
            switch (outcome.status) {
              case 'linked':
                stdout.write(`${outcome.path}\n`);
                return;
              case 'empty':
                stderr.write(`${outcome.message}\n`);
                return;
              case 'cancelled':
                stderr.write('Cancelled\n');
                return;
              case 'failed':
                throw new CliExitError(EXIT_REMOTE_ERROR, outcome.message);
            }
          }),
      )
      .demandCommand(1, 'You must specify a command')
      .strict()
      .help();

    await parser.parseAsync();
    return EXIT_OK;
  } catch (error: unknown) {
    return handleCliError(error, stderr);
  }
}

function exitCodeForZkError(code: string): number {
  switch (code) {
    case 'not_bound':
    case 'malformed_args':
      return EXIT_USAGE;
    case 'no_session':
      return EXIT_CONFIG;
    default:
      return EXIT_REMOTE_ERROR;
  }
}

function handleCliError(error: unknown, stderr: CliOutput): number {
  if (error instanceof CliExitError) {
    stderr.write(`${error.message}\n`);
    return error.exitCode;
  }

  if (error instanceof ConfigError) {
    stderr.write(`${error.message}\n`);
    return EXIT_CONFIG;
  }

  if (isZkError(error)) {
    const prefix = error.code === 'remote_error' ? 'Request failed: ' : '';
    stderr.write(`${prefix}${error.message}\n`);
    return exitCodeForZkError(error.code);
  }

  stderr.write(`Unexpected error: ${describeError(error)}\n`);
  return EXIT_UNKNOWN_ERROR;
}

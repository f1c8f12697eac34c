import { z } from 'zod';

import type { CommandInvoker } from './commandInvoker';
import { CreationAbortedError, MalformedArgsError, describeError, isZkError } from './errors';
import type { Logger } from './logger';
import { LOG_SCOPE, resolveLogger } from './logger';
import { ZK_COMMANDS } from './session';

const LspPositionSchema = z.object({
  line: z.number().int().min(0),
  character: z.number().int().min(0),
});

const LspLocationSchema = z.object({
  uri: z.string().min(1),
  range: z.object({ start: LspPositionSchema, end: LspPositionSchema }),
});

export const CreationArgsSchema = z
  .object({
    title: z.string().optional(),
    content: z.string().optional(),
    dir: z.string().optional(),
    group: z.string().optional(),
    template: z.string().optional(),
    extra: z.record(z.string()).optional(),
    date: z.string().optional(),
    edit: z.boolean().optional(),
    dryRun: z.boolean().optional(),
    insertLinkAtLocation: LspLocationSchema.optional(),
    insertContentAtLocation: LspLocationSchema.optional(),
  })
  .strict();

export type CreationArgs = z.infer<typeof CreationArgsSchema>;

export const CREATION_KEYWORDS: ReadonlySet<string> = new Set(
  Object.keys(CreationArgsSchema.shape),
);

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : 'arguments';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

function pairsToObject(pairs: readonly unknown[]): Record<string, unknown> {
  if (pairs.length % 2 !== 0) {
    throw new MalformedArgsError(
      `Creation arguments must be key/value pairs, got ${pairs.length} entries`,
    );
  }
  const output: Record<string, unknown> = {};
  for (let index = 0; index < pairs.length; index += 2) {
    const rawKey = pairs[index];
    if (typeof rawKey !== 'string') {
      throw new MalformedArgsError(`Creation argument key at position ${index} is not a keyword`);
    }
    const key = rawKey.startsWith(':') ? rawKey.slice(1) : rawKey;
    if (!CREATION_KEYWORDS.has(key)) {
      throw new MalformedArgsError(`Unknown creation argument: ${rawKey}`);
    }
    output[key] = pairs[index + 1];
  }
  return output;
}

/**
 * Accepts either an options object or a flat `[key, value, ...]` list
 * (keys optionally written `:title`).
 */
export function parseCreationArgs(input: unknown): CreationArgs {
  const candidate = Array.isArray(input) ? pairsToObject(input) : input;
  if (!candidate || typeof candidate !== 'object') {
    throw new MalformedArgsError('Creation arguments must be an object or key/value list');
  }
  const parsed = CreationArgsSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new MalformedArgsError(formatIssues(parsed.error));
  }
  return parsed.data;
}

export function extractCreatedPath(result: unknown): string | undefined {
  if (!result || typeof result !== 'object' || Array.isArray(result)) {
    return undefined;
  }
  const path = (result as Record<string, unknown>)['path'];
  return typeof path === 'string' && path.length > 0 ? path : undefined;
}

export interface NoteCreationContext {
  invoker: CommandInvoker;
  documentPath: string | undefined;
  logger?: Logger;
}

/**
 * Creates a note and returns its path. Malformed arguments throw before any
 * remote call; server failures are logged and yield `undefined`.
 */
export async function createNote(
  context: NoteCreationContext,
  args: CreationArgs | readonly unknown[],
): Promise<string | undefined> {
  const validated = parseCreationArgs(args);
  const logger = resolveLogger(context.logger);

  let result: unknown;
  try {
    result = await context.invoker.invoke(ZK_COMMANDS.new, validated, context.documentPath);
  } catch (err) {
    if (isZkError(err) && err.code !== 'remote_error') {
      throw err;
    }
    logger.error(`${LOG_SCOPE} note creation failed`, { error: describeError(err) });
    return undefined;
  }

  const path = extractCreatedPath(result);
  if (!path) {
    logger.error(`${LOG_SCOPE} note creation returned no path`, { result });
    return undefined;
  }
  return path;
}

export interface ShortcutContext extends NoteCreationContext {
  openPath: (path: string) => Promise<void> | void;
}

interface ShortcutBase {
  name: string;
  preset: CreationArgs;
}

export interface FixedTitleShortcut extends ShortcutBase {
  arity: 0;
  run: () => Promise<string>;
}

export interface TitledShortcut extends ShortcutBase {
  arity: 1;
  run: (title: string) => Promise<string>;
}

export type CreationShortcut = FixedTitleShortcut | TitledShortcut;

export function defineCreationShortcut(
  name: string,
  preset: CreationArgs & { title: string },
  context: ShortcutContext,
): FixedTitleShortcut;
export function defineCreationShortcut(
  name: string,
  preset: CreationArgs & { title?: undefined },
  context: ShortcutContext,
): TitledShortcut;
export function defineCreationShortcut(
  name: string,
  preset: CreationArgs,
  context: ShortcutContext,
): CreationShortcut;
export function defineCreationShortcut(
  name: string,
  preset: CreationArgs,
  context: ShortcutContext,
): CreationShortcut {
  const fixed = parseCreationArgs(preset);

  const createAndOpen = async (args: CreationArgs): Promise<string> => {
    const path = await createNote(context, args);
    if (!path) {
      throw new CreationAbortedError(name);
    }
    await context.openPath(path);
    return path;
  };

  if (typeof fixed.title === 'string') {
    return {
      name,
      preset: fixed,
      arity: 0,
      run: () => createAndOpen(fixed),
    };
  }

  return {
    name,
    preset: fixed,
    arity: 1,
    run: (title: string) => createAndOpen({ ...fixed, title }),
  };
}

import { buildCandidates } from './candidates';
import type { CommandInvoker } from './commandInvoker';
import { describeError, isZkError } from './errors';
import type { Logger } from './logger';
import { LOG_SCOPE, resolveLogger } from './logger';
import { normalizeNotes } from './noteNormalizer';
import type { ComposedQuery } from './queryComposer';
import { ZK_COMMANDS } from './session';
import type { Candidate, CandidateDisplayOptions, ListOptions, NoteRecord } from './types';

export const NO_NOTES_MESSAGE = 'No notes found';
export const LIST_FAILED_MESSAGE = 'Failed to list notes';

export interface NoteQueryContext {
  invoker: CommandInvoker;
  documentPath: string | undefined;
  logger?: Logger;
}

export type NoteQueryOutcome =
  | { status: 'ok'; description: string; candidates: Candidate[] }
  | { status: 'empty'; description: string; message: string; candidates: [] }
  | { status: 'failed'; description: string; message: string };

/**
 * Runs `zk.list`. Server failures are logged and yield `undefined`;
 * binding and session errors propagate.
 */
export async function listNotes(
  context: NoteQueryContext,
  options: ListOptions,
): Promise<NoteRecord[] | undefined> {
  try {
    const result = await context.invoker.invoke(ZK_COMMANDS.list, options, context.documentPath);
    return normalizeNotes(result);
  } catch (err) {
    if (isZkError(err) && err.code !== 'remote_error') {
      throw err;
    }
    resolveLogger(context.logger).error(`${LOG_SCOPE} note listing failed`, {
      error: describeError(err),
    });
    return undefined;
  }
}

export async function queryNotes(
  context: NoteQueryContext,
  query: ComposedQuery,
  display: CandidateDisplayOptions,
): Promise<NoteQueryOutcome> {
  const { description } = query;
  const notes = await listNotes(context, query.options);
  if (!notes) {
    return { status: 'failed', description, message: LIST_FAILED_MESSAGE };
  }
  if (notes.length === 0) {
    return { status: 'empty', description, message: NO_NOTES_MESSAGE, candidates: [] };
  }
  return {
    status: 'ok',
    description,
    candidates: buildCandidates(notes, display, context.logger),
  };
}

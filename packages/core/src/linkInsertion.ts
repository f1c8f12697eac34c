import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { buildCandidates } from './candidates';
import { requireBoundPath } from './commandInvoker';
import type { NoteQueryContext } from './noteQueries';
import { LIST_FAILED_MESSAGE, NO_NOTES_MESSAGE, listNotes } from './noteQueries';
import { LINK_PICKER_FIELDS, selectFields } from './queryComposer';
import { ZK_COMMANDS } from './session';
import type { Candidate, LinkArgs, LspLocation } from './types';

export type LinkInsertionOutcome =
  | { status: 'linked'; path: string; result: unknown }
  | { status: 'empty'; message: string }
  | { status: 'failed'; message: string }
  | { status: 'cancelled' };

export interface LinkInsertionRequest extends NoteQueryContext {
  /** Zero-based cursor line. */
  line: number;
  /** Zero-based cursor column. */
  column: number;
  pick: (candidates: Candidate[]) => Promise<Candidate | undefined>;
}

export function pointLocation(documentPath: string, line: number, column: number): LspLocation {
  const position = { line, character: column };
  return {
    uri: pathToFileURL(path.resolve(documentPath)).href,
    range: { start: position, end: { ...position } },
  };
}

export async function insertLink(request: LinkInsertionRequest): Promise<LinkInsertionOutcome> {
  const documentPath = requireBoundPath(request.documentPath);

  const notes = await listNotes(request, { select: selectFields(LINK_PICKER_FIELDS) });
  if (!notes) {
    return { status: 'failed', message: LIST_FAILED_MESSAGE };
  }
  if (notes.length === 0) {
    return { status: 'empty', message: NO_NOTES_MESSAGE };
  }

  const choice = await request.pick(buildCandidates(notes, {}, request.logger));
  if (!choice) {
    return { status: 'cancelled' };
  }

  const args: LinkArgs = {
    path: choice.path,
    location: pointLocation(documentPath, request.line, request.column),
  };
  const result = await request.invoker.invoke(ZK_COMMANDS.link, args, documentPath);
  return { status: 'linked', path: choice.path, result };
}

import type { CommandInvoker } from './commandInvoker';
import { normalizeTagRecords } from './noteNormalizer';
import { ZK_COMMANDS } from './session';
import type { ListOptions, NoteField, TagListOptions } from './types';

export const SEARCH_FIELDS: NoteField[] = ['title', 'path', 'tags', 'created'];
export const LINK_PICKER_FIELDS: NoteField[] = ['title', 'path'];
export const DEFAULT_RECENT_LIMIT = 20;

export type TagPrompter = () => Promise<string[]>;

export interface ComposedQuery {
  options: ListOptions;
  description: string;
}

export function selectFields(fields: readonly NoteField[]): NoteField[] {
  return Array.from(new Set(fields));
}

export function describeListQuery(queryText: string, tags: string[] | undefined): string {
  if (tags && tags.length > 0) {
    const tagLabel = `tags: ${tags.join(', ')}`;
    return queryText ? `${tagLabel}, match: ${queryText}` : tagLabel;
  }
  return `match: ${queryText}`;
}

export async function buildListOptions(
  queryText: string,
  useTagFilter: boolean,
  tagPrompter: TagPrompter,
): Promise<ComposedQuery> {
  const options: ListOptions = { select: selectFields(SEARCH_FIELDS) };
  if (queryText) {
    options.match = [queryText];
  }

  let tags: string[] | undefined;
  if (useTagFilter) {
    tags = await tagPrompter();
    options.tags = tags;
  }

  return { options, description: describeListQuery(queryText, tags) };
}

export async function fetchTagVocabulary(
  invoker: CommandInvoker,
  documentPath: string | undefined,
): Promise<string[]> {
  const args: TagListOptions = { sort: ['note-count-'] };
  const result = await invoker.invoke(ZK_COMMANDS.tagList, args, documentPath);
  return normalizeTagRecords(result).map((tag) => tag.name);
}

/** Prompter that seeds `select` with the notebook's tags, most used first. */
export function createVocabularyTagPrompter(options: {
  invoker: CommandInvoker;
  documentPath: string | undefined;
  select: (vocabulary: string[]) => Promise<string[]>;
}): TagPrompter {
  return async () => {
    const vocabulary = await fetchTagVocabulary(options.invoker, options.documentPath);
    return options.select(vocabulary);
  };
}

export type RecentBy = 'created' | 'modified';

export function buildRecentOptions(options?: {
  by?: RecentBy;
  limit?: number;
  since?: string;
}): ComposedQuery {
  const by = options?.by ?? 'modified';
  const limit = options?.limit ?? DEFAULT_RECENT_LIMIT;
  const listOptions: ListOptions = {
    select: selectFields([...SEARCH_FIELDS, by]),
    sort: [`${by}-`],
    limit,
  };
  if (options?.since) {
    if (by === 'created') {
      listOptions.createdAfter = options.since;
    } else {
      listOptions.modifiedAfter = options.since;
    }
  }
  const sinceLabel = options?.since ? ` since ${options.since}` : '';
  return { options: listOptions, description: `recent (${by})${sinceLabel}, limit: ${limit}` };
}

export function buildBacklinkOptions(notePath: string): ComposedQuery {
  return {
    options: { select: selectFields(SEARCH_FIELDS), linkTo: [notePath] },
    description: `backlinks: ${notePath}`,
  };
}

export function buildLinkOptions(notePath: string): ComposedQuery {
  return {
    options: { select: selectFields(SEARCH_FIELDS), linkedBy: [notePath] },
    description: `links: ${notePath}`,
  };
}

export function buildOrphanOptions(): ComposedQuery {
  return {
    options: { select: selectFields(SEARCH_FIELDS), orphan: true },
    description: 'orphans',
  };
}

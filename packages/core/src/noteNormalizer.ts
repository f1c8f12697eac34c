import type { NoteRecord, TagRecord } from './types';

export const DEFAULT_NOTE_TITLE = 'Untitled';

type RawRecord = Record<string, unknown>;

function asRecord(value: unknown): RawRecord {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return {};
  }
  return value as RawRecord;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function normalizeNoteTags(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((entry): entry is string => typeof entry === 'string');
}

export function normalizeNote(raw: unknown): NoteRecord {
  const record = asRecord(raw);
  const title = record['title'];
  const created = optionalString(record['created']);
  const modified = optionalString(record['modified']);

  return {
    title: isNonEmptyString(title) ? title : DEFAULT_NOTE_TITLE,
    path: optionalString(record['path']) ?? '',
    tags: normalizeNoteTags(record['tags']),
    ...(created !== undefined ? { created } : {}),
    ...(modified !== undefined ? { modified } : {}),
  };
}

export function normalizeNotes(raw: unknown): NoteRecord[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  return raw.map(normalizeNote);
}

export function normalizeTagRecords(raw: unknown): TagRecord[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  const tags: TagRecord[] = [];
  for (const entry of raw) {
    const record = asRecord(entry);
    const name = record['name'];
    if (!isNonEmptyString(name)) {
      continue;
    }
    const noteCount = record['noteCount'];
    tags.push({
      name,
      noteCount: typeof noteCount === 'number' && Number.isFinite(noteCount) ? noteCount : 0,
    });
  }
  return tags;
}

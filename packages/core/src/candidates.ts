import { formatDatetime } from './datetime';
import type { Logger } from './logger';
import type { Candidate, CandidateDisplayOptions, NoteRecord } from './types';

export function formatCandidateDisplay(
  note: NoteRecord,
  options: CandidateDisplayOptions,
  logger?: Logger,
): string {
  let display = note.title;
  if (options.includeTags && note.tags.length > 0) {
    display += ` [${note.tags.join(', ')}]`;
  }
  if (options.includeCreated && note.created !== undefined) {
    display += ` (${formatDatetime(note.created, logger)})`;
  }
  if (options.includeModified && note.modified !== undefined) {
    display += ` (${formatDatetime(note.modified, logger)})`;
  }
  return display;
}

export function buildCandidates(
  notes: readonly NoteRecord[],
  options: CandidateDisplayOptions,
  logger?: Logger,
): Candidate[] {
  return notes.map((note) => ({
    display: formatCandidateDisplay(note, options, logger),
    path: note.path,
  }));
}

/** Maps a chosen display string back to its note path; the first match wins. */
export function resolveCandidate(
  candidates: readonly Candidate[],
  display: string,
): string | undefined {
  return candidates.find((candidate) => candidate.display === display)?.path;
}

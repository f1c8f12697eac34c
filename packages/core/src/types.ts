export type NoteField = 'title' | 'path' | 'tags' | 'created' | 'modified';

export interface NoteRecord {
  title: string;
  path: string;
  tags: string[];
  created?: string; // ISO 8601
  modified?: string; // ISO 8601
}

export interface TagRecord {
  name: string;
  noteCount: number;
}

export interface ListOptions {
  select: NoteField[];
  match?: string[];
  tags?: string[];
  sort?: string[];
  limit?: number;
  linkTo?: string[];
  linkedBy?: string[];
  orphan?: boolean;
  createdAfter?: string;
  modifiedAfter?: string;
}

export interface TagListOptions {
  sort: string[];
}

export interface Candidate {
  display: string;
  path: string;
}

export interface CandidateDisplayOptions {
  includeTags?: boolean;
  includeCreated?: boolean;
  includeModified?: boolean;
}

export interface LspPosition {
  line: number;
  character: number;
}

export interface LspLocation {
  uri: string;
  range: {
    start: LspPosition;
    end: LspPosition;
  };
}

export interface LinkArgs {
  path: string;
  location: LspLocation;
  title?: string;
}

import fs from 'node:fs';
import path from 'node:path';

export const NOTEBOOK_MARKER = '.zk';

function isDirectory(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Walks upward from `startPath` (a document or a directory) and returns the
 * first directory holding a `.zk` directory.
 */
export function findNotebookRoot(startPath: string): string | undefined {
  const resolved = path.resolve(startPath);
  let current = isDirectory(resolved) ? resolved : path.dirname(resolved);

  while (true) {
    if (isDirectory(path.join(current, NOTEBOOK_MARKER))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}

export function isNotebookDocument(documentPath: string | undefined): boolean {
  if (!documentPath) {
    return false;
  }
  return findNotebookRoot(documentPath) !== undefined;
}

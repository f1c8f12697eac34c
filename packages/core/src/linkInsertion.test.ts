import { describe, expect, it, vi } from 'vitest';

import { CommandInvoker } from './commandInvoker';
import { NotBoundError } from './errors';
import { insertLink } from './linkInsertion';
import type { ZkSession } from './session';
import type { Candidate } from './types';

function createInvoker(listing: unknown) {
  const executeCommand = vi.fn(async (command: string, _args: unknown[]) =>
    command === 'zk.list' ? listing : null,
  );
  const session: ZkSession = { executeCommand };
  return { executeCommand, invoker: new CommandInvoker({ resolveSession: () => session }) };
}

describe('insertLink', () => {
  it('links the picked note at a point location', async () => {
    const { executeCommand, invoker } = createInvoker([
      { title: 'Alpha', path: 'alpha.md' },
      { title: 'Beta', path: 'beta.md' },
    ]);
    const pick = vi.fn(async (candidates: Candidate[]) => candidates[1]);

    const outcome = await insertLink({
      invoker,
      documentPath: '/nb/today.md',
      line: 3,
      column: 7,
      pick,
    });

    expect(outcome).toEqual({ status: 'linked', path: 'beta.md', result: null });
    expect(pick).toHaveBeenCalledWith([
      { display: 'Alpha', path: 'alpha.md' },
      { display: 'Beta', path: 'beta.md' },
    ]);
    expect(executeCommand).toHaveBeenNthCalledWith(1, 'zk.list', [
      '/nb/today.md',
      { select: ['title', 'path'] },
    ]);
    expect(executeCommand).toHaveBeenNthCalledWith(2, 'zk.link', [
      '/nb/today.md',
      {
        path: 'beta.md',
        location: {
          uri: 'file:///nb/today.md',
          range: {
            start: { line: 3, character: 7 },
            end: { line: 3, character: 7 },
          },
        },
      },
    ]);
  });

  it('stops when nothing is picked', async () => {
    const { executeCommand, invoker } = createInvoker([{ title: 'Alpha', path: 'alpha.md' }]);

    const outcome = await insertLink({
      invoker,
      documentPath: '/nb/today.md',
      line: 0,
      column: 0,
      pick: async () => undefined,
    });

    expect(outcome).toEqual({ status: 'cancelled' });
    expect(executeCommand).toHaveBeenCalledTimes(1);
  });

  it('reports an empty notebook without prompting', async () => {
    const { invoker } = createInvoker([]);
    const pick = vi.fn(async () => undefined);

    const outcome = await insertLink({ invoker, documentPath: '/nb/today.md', line: 0, column: 0, pick });

    expect(outcome).toEqual({ status: 'empty', message: 'No notes found' });
    expect(pick).not.toHaveBeenCalled();
  });

  it('requires a document backed by a file', async () => {
    const { executeCommand, invoker } = createInvoker([]);

    await expect(
      insertLink({ invoker, documentPath: undefined, line: 0, column: 0, pick: async () => undefined }),
    ).rejects.toBeInstanceOf(NotBoundError);
    expect(executeCommand).not.toHaveBeenCalled();
  });
});

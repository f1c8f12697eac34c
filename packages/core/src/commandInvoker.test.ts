import { describe, expect, it, vi } from 'vitest';

import { CommandInvoker } from './commandInvoker';
import { NoSessionError, NotBoundError, RemoteCommandError } from './errors';
import type { SessionResolver, ZkSession } from './session';

function createSession(result: unknown = null) {
  const executeCommand = vi.fn(async (_command: string, _args: unknown[]) => result);
  const session: ZkSession = { executeCommand };
  const resolver: SessionResolver = { resolveSession: () => session };
  return { executeCommand, resolver };
}

describe('CommandInvoker', () => {
  it('sends only the document path when no arguments are given', async () => {
    const { executeCommand, resolver } = createSession({ ok: true });
    const invoker = new CommandInvoker(resolver);

    const result = await invoker.invoke('zk.index', undefined, '/notes/today.md');

    expect(result).toEqual({ ok: true });
    expect(executeCommand).toHaveBeenCalledWith('zk.index', ['/notes/today.md']);
  });

  it('appends the arguments object after the document path', async () => {
    const { executeCommand, resolver } = createSession([]);
    const invoker = new CommandInvoker(resolver);

    await invoker.invoke('zk.list', { select: ['title'] }, '/notes/today.md');

    expect(executeCommand).toHaveBeenCalledWith('zk.list', [
      '/notes/today.md',
      { select: ['title'] },
    ]);
  });

  it('rejects unbacked documents before resolving a session', async () => {
    const resolveSession = vi.fn(() => undefined);
    const invoker = new CommandInvoker({ resolveSession });

    await expect(invoker.invoke('zk.index', undefined, undefined)).rejects.toBeInstanceOf(
      NotBoundError,
    );
    await expect(invoker.invoke('zk.index', undefined, '   ')).rejects.toBeInstanceOf(
      NotBoundError,
    );
    expect(resolveSession).not.toHaveBeenCalled();
  });

  it('forwards the document path exactly as given', async () => {
    const { executeCommand, resolver } = createSession();
    const invoker = new CommandInvoker(resolver);

    await invoker.invoke('zk.index', undefined, '/notes/ padded .md ');

    expect(executeCommand).toHaveBeenCalledWith('zk.index', ['/notes/ padded .md ']);
  });

  it('fails with NoSessionError when nothing serves the document', async () => {
    const invoker = new CommandInvoker({ resolveSession: () => undefined });

    const pending = invoker.invoke('zk.index', undefined, '/elsewhere/a.md');

    await expect(pending).rejects.toBeInstanceOf(NoSessionError);
    await expect(pending).rejects.toMatchObject({
      code: 'no_session',
      message: 'No zk session is active for /elsewhere/a.md',
    });
  });

  it('passes remote errors through unchanged', async () => {
    const remote = new RemoteCommandError('index locked', { rpcCode: -32603 });
    const session: ZkSession = { executeCommand: vi.fn(async () => Promise.reject(remote)) };
    const invoker = new CommandInvoker({ resolveSession: () => session });

    await expect(invoker.indexNotebook('/notes/a.md')).rejects.toBe(remote);
  });
});

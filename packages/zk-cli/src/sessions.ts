import type { Logger, SessionResolver, ZkSession } from '@zk-query/core';
import { findNotebookRoot } from '@zk-query/core';

import { LspSession } from './lspSession';

export interface ClosableSession extends ZkSession {
  shutdown(): Promise<void>;
}

export type SessionFactory = (notebookRoot: string) => ClosableSession;

/**
 * Keeps one server session per notebook. Documents outside any notebook
 * resolve to no session.
 */
export class NotebookSessions implements SessionResolver {
  private readonly sessions = new Map<string, ClosableSession>();
  private readonly factory: SessionFactory;
  private readonly logger: Logger;

  constructor(factory: SessionFactory, logger: Logger = console) {
    this.factory = factory;
    this.logger = logger;
  }

  resolveSession(documentPath: string): ZkSession | undefined {
    const root = findNotebookRoot(documentPath);
    if (!root) {
      return undefined;
    }
    const existing = this.sessions.get(root);
    if (existing) {
      return existing;
    }
    const session = this.factory(root);
    this.sessions.set(root, session);
    return session;
  }

  async closeAll(): Promise<void> {
    const sessions = Array.from(this.sessions.entries());
    this.sessions.clear();
    for (const [root, session] of sessions) {
      try {
        await session.shutdown();
      } catch (err) {
        this.logger.warn('[zk-query] session shutdown failed', {
          root,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}

export function createLspSessionFactory(options: {
  command: string;
  args: string[];
  logger?: Logger;
}): SessionFactory {
  return (notebookRoot) =>
    LspSession.spawn({
      command: options.command,
      args: options.args,
      rootPath: notebookRoot,
      ...(options.logger ? { logger: options.logger } : {}),
    });
}

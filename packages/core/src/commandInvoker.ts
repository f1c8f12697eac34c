import { NoSessionError, NotBoundError } from './errors';
import type { SessionResolver } from './session';
import { ZK_COMMANDS } from './session';

export class CommandInvoker {
  private readonly sessions: SessionResolver;

  constructor(sessions: SessionResolver) {
    this.sessions = sessions;
  }

  /**
   * Runs `command` against the session serving `documentPath`. Errors raised
   * by the session propagate untouched.
   */
  async invoke(
    command: string,
    args: object | undefined,
    documentPath: string | undefined,
  ): Promise<unknown> {
    const boundPath = requireBoundPath(documentPath);
    const session = this.sessions.resolveSession(boundPath);
    if (!session) {
      throw new NoSessionError(boundPath);
    }
    const commandArgs: unknown[] = args === undefined ? [boundPath] : [boundPath, args];
    return session.executeCommand(command, commandArgs);
  }

  async indexNotebook(documentPath: string | undefined): Promise<unknown> {
    return this.invoke(ZK_COMMANDS.index, undefined, documentPath);
  }
}

export function requireBoundPath(documentPath: string | undefined): string {
  if (documentPath === undefined || !documentPath.trim()) {
    throw new NotBoundError();
  }
  return documentPath;
}

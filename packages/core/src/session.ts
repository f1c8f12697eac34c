/**
 * A live connection to the notebook server. Implementations reject with
 * `RemoteCommandError` when the server reports a failure.
 */
export interface ZkSession {
  executeCommand(command: string, args: unknown[]): Promise<unknown>;
}

/** Looks up the session that serves a given document, if one is running. */
export interface SessionResolver {
  resolveSession(documentPath: string): ZkSession | undefined;
}

export const ZK_COMMANDS = {
  index: 'zk.index',
  list: 'zk.list',
  tagList: 'zk.tag.list',
  new: 'zk.new',
  link: 'zk.link',
} as const;

export type ZkCommand = (typeof ZK_COMMANDS)[keyof typeof ZK_COMMANDS];

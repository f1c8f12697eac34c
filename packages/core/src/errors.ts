export class ZkError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The document has no location on disk (unsaved or virtual buffer). */
export class NotBoundError extends ZkError {
  constructor(message = 'Document is not backed by a file') {
    super('not_bound', message);
  }
}

export class NoSessionError extends ZkError {
  readonly documentPath: string;

  constructor(documentPath: string) {
    super('no_session', `No zk session is active for ${documentPath}`);
    this.documentPath = documentPath;
  }
}

export class MalformedArgsError extends ZkError {
  constructor(message: string) {
    super('malformed_args', message);
  }
}

/**
 * Failure reported by the server (or the transport carrying the request).
 * `rpcCode` holds the JSON-RPC error code when the server sent one.
 */
export class RemoteCommandError extends ZkError {
  readonly rpcCode: number | string | undefined;
  readonly data: unknown;

  constructor(message: string, options?: { rpcCode?: number | string; data?: unknown }) {
    super('remote_error', message);
    this.rpcCode = options?.rpcCode;
    this.data = options?.data;
  }
}

export class CreationAbortedError extends ZkError {
  constructor(shortcut: string) {
    super('creation_aborted', `Note creation failed for ${shortcut}`);
  }
}

export function isZkError(error: unknown): error is ZkError {
  return error instanceof ZkError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

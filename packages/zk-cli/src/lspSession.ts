import { spawn } from 'node:child_process';
import path from 'node:path';
import type { Readable, Writable } from 'node:stream';
import { pathToFileURL } from 'node:url';

import type { Logger, ZkSession } from '@zk-query/core';
import { RemoteCommandError } from '@zk-query/core';

interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: number;
  method: string;
  params?: unknown;
}

interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: unknown;
}

interface JsonRpcErrorObject {
  code: number | string;
  message: string;
  data?: unknown;
}

interface JsonRpcIncoming {
  jsonrpc?: string;
  id?: number | string | null;
  method?: string;
  params?: unknown;
  result?: unknown;
  error?: JsonRpcErrorObject;
}

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (reason: Error) => void;
}

export interface LspTransport {
  /** Server output (its stdout). */
  input: Readable;
  /** Server input (its stdin). */
  output: Writable;
}

export interface LspSessionOptions {
  transport: LspTransport;
  rootPath: string;
  name?: string;
  logger?: Logger;
}

export interface SpawnLspSessionOptions {
  command: string;
  args: string[];
  rootPath: string;
  logger?: Logger;
}

const HEADER_DELIMITER = Buffer.from('\r\n\r\n');
const CLIENT_INFO = { name: 'zk-query', version: '0.1.0' };

export function encodeLspMessage(message: JsonRpcRequest | JsonRpcNotification | object): string {
  const body = JSON.stringify(message);
  return `Content-Length: ${Buffer.byteLength(body, 'utf8')}\r\n\r\n${body}`;
}

export class LspSession implements ZkSession {
  private readonly transport: LspTransport;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly rootPath: string;
  private readonly serverName: string;
  private readonly logger: Logger;
  private buffer: Buffer = Buffer.alloc(0);
  private expectedContentLength: number | null = null;
  private nextId = 1;
  private closed = false;
  private initializePromise: Promise<void> | null = null;

  constructor(options: LspSessionOptions) {
    this.transport = options.transport;
    this.rootPath = path.resolve(options.rootPath);
    this.serverName = options.name ?? 'zk';
    this.logger = options.logger ?? console;

    this.transport.input.on('data', (chunk: Buffer) => {
      this.handleChunk(chunk);
    });
    this.transport.input.on('end', () => {
      this.markClosed(`${this.serverName} closed its output`);
    });
  }

  static spawn(options: SpawnLspSessionOptions): LspSession {
    const child = spawn(options.command, options.args, {
      cwd: options.rootPath,
      stdio: ['pipe', 'pipe', 'pipe'],
    });
    const name = path.basename(options.command);
    const logger = options.logger ?? console;

    const session = new LspSession({
      transport: { input: child.stdout, output: child.stdin },
      rootPath: options.rootPath,
      name,
      logger,
    });

    child.stderr.on('data', (chunk: Buffer) => {
      logger.error(`[${name} stderr]`, chunk.toString('utf8').trim());
    });
    child.on('error', (err) => {
      session.markClosed(`Failed to start ${name}: ${String(err)}`);
    });
    child.on('exit', (code, signal) => {
      session.markClosed(
        code !== null
          ? `${name} exited with code ${code}`
          : `${name} exited with signal ${signal ?? 'unknown'}`,
      );
    });

    return session;
  }

  async executeCommand(command: string, args: unknown[]): Promise<unknown> {
    if (this.closed) {
      throw new RemoteCommandError(`${this.serverName} session is not available`);
    }
    await this.ensureInitialized();
    return this.sendRequest('workspace/executeCommand', { command, arguments: args });
  }

  async shutdown(): Promise<void> {
    if (this.closed) {
      return;
    }
    if (this.initializePromise) {
      await this.sendRequest('shutdown', null);
    }
    this.sendNotification('exit', null);
    this.transport.output.end();
    this.markClosed(`${this.serverName} session was shut down`);
  }

  private async ensureInitialized(): Promise<void> {
    if (!this.initializePromise) {
      this.initializePromise = this.performInitialize();
    }
    return this.initializePromise;
  }

  private async performInitialize(): Promise<void> {
    const rootUri = pathToFileURL(this.rootPath).href;
    await this.sendRequest('initialize', {
      processId: process.pid,
      clientInfo: CLIENT_INFO,
      rootUri,
      workspaceFolders: [{ uri: rootUri, name: path.basename(this.rootPath) }],
      capabilities: {},
    });
    this.sendNotification('initialized', {});
  }

  private handleChunk(chunk: Buffer): void {
    this.buffer = Buffer.concat([this.buffer, chunk]);

    while (true) {
      if (this.expectedContentLength === null) {
        const headerEnd = this.buffer.indexOf(HEADER_DELIMITER);
        if (headerEnd === -1) {
          return;
        }

        const header = this.buffer.subarray(0, headerEnd).toString('utf8');
        const match = /Content-Length:\s*(\d+)/i.exec(header);
        this.buffer = this.buffer.subarray(headerEnd + HEADER_DELIMITER.length);
        if (!match) {
          this.logger.error(`[${this.serverName}] dropped message without Content-Length header`);
          continue;
        }
        this.expectedContentLength = Number.parseInt(match[1] ?? '', 10);
      }

      if (this.expectedContentLength === null || this.buffer.length < this.expectedContentLength) {
        return;
      }

      const body = this.buffer.subarray(0, this.expectedContentLength).toString('utf8');
      this.buffer = this.buffer.subarray(this.expectedContentLength);
      this.expectedContentLength = null;

      let message: JsonRpcIncoming;
      try {
        message = JSON.parse(body) as JsonRpcIncoming;
      } catch {
        this.logger.error(`[${this.serverName}] failed to parse JSON-RPC message`);
        continue;
      }
      this.handleMessage(message);
    }
  }

  private handleMessage(message: JsonRpcIncoming): void {
    if (typeof message.method === 'string') {
      if (message.id !== undefined && message.id !== null) {
        // Server-initiated request; the client advertises no capabilities.
        this.write({ jsonrpc: '2.0', id: message.id, result: null });
        return;
      }
      if (message.method === 'window/logMessage' || message.method === 'window/showMessage') {
        this.logger.info(`[${this.serverName}]`, message.params);
      }
      return;
    }

    if (typeof message.id !== 'number') {
      return;
    }
    const pending = this.pending.get(message.id);
    if (!pending) {
      return;
    }
    this.pending.delete(message.id);

    if (message.error) {
      const { code, message: errorMessage, data } = message.error;
      pending.reject(
        new RemoteCommandError(errorMessage || `${this.serverName} request failed`, {
          rpcCode: code,
          data,
        }),
      );
      return;
    }
    pending.resolve(message.result);
  }

  private sendNotification(method: string, params: unknown): void {
    const notification: JsonRpcNotification = { jsonrpc: '2.0', method, params };
    this.write(notification);
  }

  private sendRequest(method: string, params: unknown): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(
        new RemoteCommandError(`${this.serverName} session is not available`),
      );
    }

    const id = this.nextId++;
    const request: JsonRpcRequest = { jsonrpc: '2.0', id, method, params };

    return new Promise((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      try {
        this.transport.output.write(encodeLspMessage(request));
      } catch (err) {
        this.pending.delete(id);
        reject(new RemoteCommandError(`Failed to write to ${this.serverName}: ${String(err)}`));
      }
    });
  }

  private write(message: object): void {
    if (this.closed) {
      return;
    }
    try {
      this.transport.output.write(encodeLspMessage(message));
    } catch (err) {
      this.logger.error(`[${this.serverName}] failed to send message`, err);
    }
  }

  private markClosed(reason: string): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const error = new RemoteCommandError(reason);
    for (const pending of this.pending.values()) {
      pending.reject(error);
    }
    this.pending.clear();
  }
}

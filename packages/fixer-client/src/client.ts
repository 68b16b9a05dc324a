import { ChildProcessWithoutNullStreams, spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { createInterface, Interface } from 'node:readline';

import { encodeJsonRpcRequest, isResponse, parseJsonRpcMessage } from './jsonrpc.js';
import { FixerMethod, FixerTransport, JsonRpcNotification, JsonRpcResponse } from './types.js';

export interface FixerServerClientOptions {
  bin: string;
  args?: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Per-request timeout. */
  timeoutMs?: number;
}

type PendingResponse = {
  resolve: (value: unknown) => void;
  reject: (reason: unknown) => void;
  method: string;
  timer: NodeJS.Timeout;
};

export class FixerRequestError extends Error {
  constructor(
    readonly method: string,
    message: string,
    readonly code: number | null = null
  ) {
    super(`${method} failed: ${message}`);
    this.name = 'FixerRequestError';
  }
}

/**
 * Line-delimited JSON-RPC 2.0 over the stdio of a spawned fixer process. The
 * process starts lazily on the first request.
 */
export class FixerServerClient extends EventEmitter implements FixerTransport {
  private readonly bin: string;
  private readonly args: string[];
  private readonly cwd?: string;
  private readonly env?: NodeJS.ProcessEnv;
  private readonly timeoutMs: number;

  private child: ChildProcessWithoutNullStreams | null = null;
  private rl: Interface | null = null;

  private nextRequestId = 1;
  private readonly pendingResponses = new Map<number, PendingResponse>();

  constructor(options: FixerServerClientOptions) {
    super();
    this.bin = options.bin;
    this.args = options.args ?? [];
    this.cwd = options.cwd;
    this.env = options.env;
    this.timeoutMs = options.timeoutMs ?? 120_000;
  }

  async start(): Promise<void> {
    if (this.child) {
      return;
    }

    const child = spawn(this.bin, this.args, {
      cwd: this.cwd,
      env: this.env,
      stdio: ['pipe', 'pipe', 'pipe']
    });

    this.child = child;

    this.rl = createInterface({ input: child.stdout });
    this.rl.on('line', (line) => this.handleStdoutLine(line));

    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      this.emit('stderr', chunk);
    });

    child.once('exit', (code, signal) => {
      this.child = null;
      this.failAllPending(new Error(`fixer process exited (code=${code ?? 'null'}, signal=${signal ?? 'null'})`));
      this.emit('exit', { code, signal });
    });

    child.once('error', (error) => {
      this.child = null;
      this.failAllPending(error);
      this.emit('processError', error);
    });
  }

  async stop(): Promise<void> {
    if (!this.child) {
      return;
    }

    const child = this.child;
    this.child = null;

    this.rl?.close();
    this.rl = null;

    await new Promise<void>((resolve) => {
      child.once('exit', () => resolve());
      child.kill('SIGTERM');
      setTimeout(() => {
        child.kill('SIGKILL');
      }, 2_000).unref();
    });
  }

  async request(method: FixerMethod, params: unknown): Promise<unknown> {
    if (!this.child) {
      await this.start();
    }

    const activeChild = this.child;
    if (!activeChild) {
      throw new Error('Failed to start fixer process');
    }

    const id = this.nextRequestId++;
    const line = encodeJsonRpcRequest(id, method, params);

    const responsePromise = new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingResponses.delete(id);
        reject(new FixerRequestError(method, `timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      this.pendingResponses.set(id, { resolve, reject, method, timer });
    });

    activeChild.stdin.write(`${line}\n`);
    return responsePromise;
  }

  private failAllPending(reason: unknown): void {
    for (const pending of this.pendingResponses.values()) {
      clearTimeout(pending.timer);
      pending.reject(reason);
    }
    this.pendingResponses.clear();
  }

  private handleStdoutLine(line: string): void {
    if (!line.trim()) {
      return;
    }

    try {
      const message = parseJsonRpcMessage(line);
      if (isResponse(message)) {
        this.handleResponse(message);
      } else {
        this.handleNotification(message);
      }
    } catch (error) {
      this.emit('parseError', { line, error });
    }
  }

  private handleResponse(response: JsonRpcResponse): void {
    const pending = this.pendingResponses.get(response.id);
    if (!pending) {
      return;
    }

    this.pendingResponses.delete(response.id);
    clearTimeout(pending.timer);

    if ('error' in response) {
      pending.reject(new FixerRequestError(pending.method, response.error.message, response.error.code));
      return;
    }

    pending.resolve(response.result);
  }

  private handleNotification(notification: JsonRpcNotification): void {
    this.emit('notification', notification);
  }
}

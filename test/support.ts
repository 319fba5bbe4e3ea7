/**
 * Test doubles shared by the workspace suites
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { LoggerLike, OperatorLevel } from '@bgctl/logger';
import type { CommandRunner, ExecResult } from '@bgctl/runtime';
import type { DeploymentLifecycle, ProxyRuntime, TemplateSource } from '@bgctl/deployment';

export interface LogRecord {
  level: OperatorLevel;
  message: string;
  meta?: Record<string, unknown>;
}

export class RecordingLogger implements LoggerLike {
  readonly records: LogRecord[] = [];

  messages(level: OperatorLevel): string[] {
    return this.records.filter((r) => r.level === level).map((r) => r.message);
  }

  error(message: string, meta?: Record<string, unknown>) {
    this.records.push({ level: 'error', message, meta });
  }
  warn(message: string, meta?: Record<string, unknown>) {
    this.records.push({ level: 'warn', message, meta });
  }
  success(message: string, meta?: Record<string, unknown>) {
    this.records.push({ level: 'success', message, meta });
  }
  status(message: string, meta?: Record<string, unknown>) {
    this.records.push({ level: 'status', message, meta });
  }
  info(message: string, meta?: Record<string, unknown>) {
    this.records.push({ level: 'info', message, meta });
  }
  debug(message: string, meta?: Record<string, unknown>) {
    this.records.push({ level: 'debug', message, meta });
  }
}

export interface RecordedRequest {
  method: string;
  url: string;
}

export type Handler = (req: IncomingMessage, res: ServerResponse) => void;

/** In-process HTTP server standing in for a pool or the proxy */
export class StubServer {
  readonly requests: RecordedRequest[] = [];
  private server: Server | null = null;

  constructor(private handler: Handler) {}

  setHandler(handler: Handler): void {
    this.handler = handler;
  }

  async start(): Promise<number> {
    const server = createServer((req, res) => {
      this.requests.push({ method: req.method ?? '', url: req.url ?? '' });
      this.handler(req, res);
    });
    this.server = server;
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    return this.port;
  }

  get port(): number {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      throw new Error('server not started');
    }
    return address.port;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  }
}

/** A port nothing listens on: bound, then released */
export async function unusedPort(): Promise<number> {
  const stub = new StubServer((_req, res) => res.end());
  const port = await stub.start();
  await stub.stop();
  return port;
}

/** Answers like a pool application: X-App-Pool on every response */
export function poolHandler(pool: string, statusCode = 200): Handler {
  return (_req, res) => {
    res.writeHead(statusCode, { 'X-App-Pool': pool, 'Content-Type': 'text/plain' });
    res.end(`${pool}\n`);
  };
}

export interface RunnerCall {
  file: string;
  args: string[];
}

/** Scripted stand-in for the docker CLI; a script that throws makes run() reject */
export class FakeRunner implements CommandRunner {
  readonly calls: RunnerCall[] = [];

  constructor(private readonly script: (args: readonly string[]) => Partial<ExecResult> = () => ({})) {}

  async run(file: string, args: readonly string[]): Promise<ExecResult> {
    this.calls.push({ file, args: [...args] });
    return { stdout: '', stderr: '', code: 0, duration: 1, ...this.script(args) };
  }
}

export const inlineTemplate = (text: string): TemplateSource => ({
  load: async () => text,
  describe: () => 'inline',
});

/** Records every config it is asked to apply; set `failure` to make apply() reject */
export class FakeProxyRuntime implements ProxyRuntime {
  readonly applied: string[] = [];
  failure: Error | null = null;

  async apply(config: string): Promise<void> {
    if (this.failure) throw this.failure;
    this.applied.push(config);
  }

  describe(): string {
    return 'fake';
  }
}

export class FakeLifecycle implements DeploymentLifecycle {
  readonly actions: string[] = [];
  containers: string[] = [];
  failure: Error | null = null;

  async up(): Promise<void> {
    this.record('up');
  }

  async down(): Promise<void> {
    this.record('down');
  }

  async listStatus(): Promise<string[]> {
    this.record('ps');
    return this.containers;
  }

  private record(action: string): void {
    this.actions.push(action);
    if (this.failure) throw this.failure;
  }
}

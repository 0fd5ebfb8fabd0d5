import type { AddressInfo } from 'node:net';
import WebSocket, { WebSocketServer } from 'ws';
import type { CdpParams } from '../connection.js';
import { isRecord } from '../connection.js';

export interface FakeCommand {
  /** Socket path the command arrived on, e.g. `/devtools/page/page-1` */
  path: string;
  id: number;
  method: string;
  params: CdpParams;
  /** The frame as received */
  raw: string;
}

/** Returns the `result` to reply with, or `null` to never reply. */
export type FakeHandler = (
  params: CdpParams,
  command: FakeCommand,
  chrome: FakeChrome,
) => CdpParams | undefined | null | Promise<CdpParams | undefined | null>;

/** Thrown from a handler to answer with a DevTools `error` reply. */
export class FakeCdpError extends Error {
  readonly code: number;
  constructor(code: number, message: string) {
    super(message);
    this.code = code;
  }
}

export const FAKE_TARGET_ID = 'page-1';
export const FAKE_FRAME_ID = 'frame-1';

export function base64(text: string): string {
  return Buffer.from(text, 'utf8').toString('base64');
}

/**
 * An in-process stand-in for Chrome's DevTools endpoint: answers commands
 * from a handler table, records them, and pushes events on request.
 * `Page.navigate` fires DOMContentLoaded and the load event by default.
 */
export class FakeChrome {
  readonly commands: FakeCommand[] = [];
  /** Errors thrown while answering; a test can assert this stays empty. */
  readonly failures: unknown[] = [];
  private readonly server: WebSocketServer;
  private readonly sockets = new Map<WebSocket, string>();
  private readonly handlers = new Map<string, FakeHandler>();

  private constructor(server: WebSocketServer) {
    this.server = server;
    this.installDefaults();
    server.on('connection', (socket, request) => {
      const path = request.url ?? '/';
      this.sockets.set(socket, path);
      socket.on('close', () => this.sockets.delete(socket));
      socket.on('message', (data: WebSocket.RawData) => {
        this.answer(socket, path, data.toString()).catch((err: unknown) => this.failures.push(err));
      });
    });
  }

  static start(): Promise<FakeChrome> {
    return new Promise((resolve, reject) => {
      const server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
      server.once('listening', () => resolve(new FakeChrome(server)));
      server.once('error', reject);
    });
  }

  get port(): number {
    const address = this.server.address();
    if (address === null || typeof address === 'string') throw new Error(`Unexpected server address ${String(address)}`);
    const info: AddressInfo = address;
    return info.port;
  }

  get browserUrl(): string {
    return `ws://127.0.0.1:${this.port}/devtools/browser/fake-browser`;
  }

  /** Replaces the handler for `method`. */
  handle(method: string, handler: FakeHandler): this {
    this.handlers.set(method, handler);
    return this;
  }

  /** Sends an event to every connected page socket. */
  emit(method: string, params: CdpParams = {}): void {
    this.broadcast(JSON.stringify({ method, params }), p => p.startsWith('/devtools/page/'));
  }

  /** Sends a raw frame to every socket. */
  sendRaw(text: string): void {
    this.broadcast(text, () => true);
  }

  /** Method names received, in order, optionally only on page sockets. */
  methods(opts: { pageOnly?: boolean } = {}): string[] {
    return this.commands
      .filter(c => !opts.pageOnly || c.path.startsWith('/devtools/page/'))
      .map(c => c.method);
  }

  find(method: string): FakeCommand[] {
    return this.commands.filter(c => c.method === method);
  }

  /** Drops every open socket without a close handshake. */
  dropConnections(): void {
    for (const socket of this.sockets.keys()) socket.terminate();
  }

  close(): Promise<void> {
    for (const socket of this.sockets.keys()) socket.terminate();
    return new Promise((resolve, reject) => {
      this.server.close(err => (err ? reject(err) : resolve()));
    });
  }

  private broadcast(frame: string, wants: (path: string) => boolean): void {
    for (const [socket, path] of this.sockets) {
      if (wants(path) && socket.readyState === WebSocket.OPEN) socket.send(frame);
    }
  }

  private async answer(socket: WebSocket, path: string, raw: string): Promise<void> {
    const message: unknown = JSON.parse(raw);
    if (!isRecord(message) || typeof message.id !== 'number' || typeof message.method !== 'string') return;
    const command: FakeCommand = {
      path,
      id: message.id,
      method: message.method,
      params: isRecord(message.params) ? message.params : {},
      raw,
    };
    this.commands.push(command);

    const handler = this.handlers.get(command.method);
    let reply: string;
    if (!handler) {
      reply = JSON.stringify({ id: command.id, error: { code: -32601, message: `'${command.method}' wasn't found` } });
    } else {
      try {
        const result = await handler(command.params, command, this);
        if (result === null) return;
        reply = JSON.stringify({ id: command.id, result: result ?? {} });
      } catch (err) {
        const code = err instanceof FakeCdpError ? err.code : -32000;
        const text = err instanceof Error ? err.message : String(err);
        reply = JSON.stringify({ id: command.id, error: { code, message: text } });
      }
    }
    if (socket.readyState === WebSocket.OPEN) socket.send(reply);
  }

  private installDefaults(): void {
    const ok: FakeHandler = () => ({});
    for (const method of [
      'Page.enable', 'Page.setLifecycleEventsEnabled', 'Page.setDocumentContent', 'Network.enable',
      'Network.setCacheDisabled', 'Fetch.enable', 'Fetch.disable', 'Fetch.continueRequest',
      'Fetch.failRequest', 'Browser.close',
    ]) {
      this.handlers.set(method, ok);
    }
    this.handlers.set('Target.createTarget', () => ({ targetId: FAKE_TARGET_ID }));
    this.handlers.set('Page.getFrameTree', () => ({ frameTree: { frame: { id: FAKE_FRAME_ID, url: 'about:blank' } } }));
    this.handlers.set('Page.navigate', (_params, _command, chrome) => {
      setTimeout(() => {
        chrome.emit('Page.lifecycleEvent', { frameId: FAKE_FRAME_ID, name: 'DOMContentLoaded' });
        chrome.emit('Page.loadEventFired', { timestamp: 1 });
      }, 5);
      return { frameId: FAKE_FRAME_ID, loaderId: 'loader-1' };
    });
    this.handlers.set('Runtime.evaluate', () => ({ result: { type: 'undefined' } }));
    this.handlers.set('Page.printToPDF', () => ({ data: base64('%PDF-1.4 fake') }));
    this.handlers.set('Page.captureScreenshot', () => ({ data: base64('fake-png') }));
    this.handlers.set('Page.captureSnapshot', () => ({ data: 'MIME-Version: 1.0\r\n\r\nfake' }));
  }
}

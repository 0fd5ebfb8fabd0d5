import WebSocket from 'ws';
import type winston from 'winston';
import { type CountdownTimer, waitBound } from './countdown-timer.js';
import {
  ConversionTimeoutError,
  ErrorCode,
  ProtocolConnectionError,
  ProtocolError,
  ProtocolParseError,
  ProtocolTimeoutError,
  describeError,
} from './errors.js';

export type CdpParams = Record<string, unknown>;

/** An event to wait for: its method and, optionally, values its params must contain. */
export interface EventMatcher {
  method: string;
  params?: CdpParams;
}

export interface WaitOptions {
  /** Bound for this wait alone, further capped by `countdown.remaining` */
  timeoutMs?: number;
  countdown?: CountdownTimer;
}

export type EventListener = (params: CdpParams) => void | Promise<void>;

interface PendingRequest {
  method: string;
  resolve: (result: CdpParams) => void;
  reject: (err: Error) => void;
  timer?: NodeJS.Timeout;
}

interface Subscription {
  matcher: EventMatcher;
  resolve: (params: CdpParams) => void;
  reject: (err: Error) => void;
  release: () => void;
}

// setTimeout overflows above this and fires at once
const MAX_TIMER_MS = 2_147_483_647;
const CLOSE_GRACE_MS = 1_000;
const MAX_LOGGED_FRAME = 500;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** JSON with object keys sorted, so equal values always serialize the same. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(',')}]`;
  if (isRecord(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map(k => `${JSON.stringify(k)}:${canonicalJson(value[k])}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function subscriptionKey(matcher: EventMatcher): string {
  return `${matcher.method}|${canonicalJson(matcher.params ?? {})}`;
}

function matches(matcher: EventMatcher, method: string, params: CdpParams): boolean {
  if (matcher.method !== method) return false;
  if (!matcher.params) return true;
  return Object.entries(matcher.params).every(([key, expected]) => canonicalJson(params[key]) === canonicalJson(expected));
}

/** True when the countdown, rather than the operation's own timeout, sets the wait bound. */
function countdownBinds(opts: WaitOptions): boolean {
  return opts.countdown !== undefined && opts.countdown.remaining <= (opts.timeoutMs ?? Number.POSITIVE_INFINITY);
}

function truncate(text: string): string {
  return text.length > MAX_LOGGED_FRAME ? `${text.slice(0, MAX_LOGGED_FRAME)}… (${text.length} chars)` : text;
}

/** Reads a string field from a command result, failing with the command name when it is missing. */
export function expectString(result: CdpParams, key: string, method: string): string {
  const value = result[key];
  if (typeof value !== 'string') {
    throw new ProtocolError(ErrorCode.COMMAND_FAILED, `${method} returned no '${key}'`, { method, key });
  }
  return value;
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Turns a promise into one that never rejects. For waits registered ahead of
 * the command that triggers them, which may end up never being awaited.
 */
export function settle<T>(promise: Promise<T>): Promise<Outcome<T>> {
  return promise.then(
    (value): Outcome<T> => ({ ok: true, value }),
    (error: unknown): Outcome<T> => ({ ok: false, error }),
  );
}

/**
 * One DevTools WebSocket: the browser socket or a page socket.
 *
 * Commands are correlated by a monotonically increasing id. Events go first
 * to persistent listeners (`on`) and then to at most one one-shot
 * subscription (`waitForEvent`).
 */
export class CdpConnection {
  readonly url: string;
  private readonly ws: WebSocket;
  private readonly logger: winston.Logger;
  private readonly logTraffic: boolean;
  private msgId = 0;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly subscriptions = new Map<string, Subscription>();
  private readonly listeners = new Map<string, Set<EventListener>>();
  private _closed = false;
  private closing: Promise<void> | null = null;

  private constructor(url: string, ws: WebSocket, opts: { logger: winston.Logger; logTraffic: boolean }) {
    this.url = url;
    this.ws = ws;
    this.logger = opts.logger;
    this.logTraffic = opts.logTraffic;
    ws.on('message', (data: WebSocket.RawData) => this.receive(data.toString()));
    ws.on('close', () => this.teardown('DevTools connection closed'));
    ws.on('error', (err: Error) => {
      this.logger.warn(`DevTools socket error on ${this.url}: ${err.message}`);
      this.teardown(`DevTools connection failed: ${err.message}`);
    });
  }

  /**
   * Opens the socket. The handshake waits `connectTimeoutMs` or what is left of
   * the countdown, whichever is shorter; running out of the countdown fails
   * with `ConversionTimeoutError`, running out of `connectTimeoutMs` with
   * `CONNECT_FAILED`.
   */
  static connect(
    url: string,
    opts: { logger: winston.Logger; connectTimeoutMs?: number; logTraffic?: boolean; countdown?: CountdownTimer },
  ): Promise<CdpConnection> {
    const connectTimeoutMs = opts.connectTimeoutMs ?? 10_000;
    const { countdown } = opts;
    if (countdown?.expired) {
      return Promise.reject(new ConversionTimeoutError(`The conversion timed out before connecting to ${url}`, { url }));
    }
    const byCountdown = countdownBinds({ countdown, timeoutMs: connectTimeoutMs });
    const bound = Math.max(1, waitBound(connectTimeoutMs, countdown));
    return new Promise<CdpConnection>((resolve, reject) => {
      const ws = new WebSocket(url, { perMessageDeflate: false });
      const fail = (error: Error) => {
        clearTimeout(timer);
        ws.off('open', onOpen);
        ws.off('error', onError);
        // terminating a socket that is still connecting emits one more 'error'
        ws.on('error', (err: Error) => opts.logger.debug(`Abandoned socket to ${url}: ${err.message}`));
        ws.terminate();
        reject(error);
      };
      const onOpen = () => {
        clearTimeout(timer);
        ws.off('error', onError);
        opts.logger.debug(`Connected to ${url}`);
        resolve(new CdpConnection(url, ws, { logger: opts.logger, logTraffic: opts.logTraffic ?? false }));
      };
      const onError = (err: Error) => fail(
        new ProtocolConnectionError(ErrorCode.CONNECT_FAILED, `Could not connect to ${url}: ${err.message}`, { url }, { cause: err }),
      );
      const onTimeout = () => fail(byCountdown && countdown
        ? new ConversionTimeoutError(`The conversion timed out after ${countdown.budgetMs} ms while connecting to ${url}`, { url, budgetMs: countdown.budgetMs })
        : new ProtocolConnectionError(ErrorCode.CONNECT_FAILED, `Connecting to ${url} timed out after ${connectTimeoutMs} ms`, { url }));
      const timer = setTimeout(onTimeout, bound);
      ws.once('open', onOpen);
      ws.once('error', onError);
    });
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Number of commands still waiting for a reply. */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Sends a command and resolves with its `result`.
   *
   * An expired countdown fails with `ConversionTimeoutError` before anything
   * is sent. A wait that runs out fails with `ConversionTimeoutError` when the
   * countdown is what ran out and with `ProtocolTimeoutError` otherwise.
   */
  async send(method: string, params?: CdpParams, opts: WaitOptions = {}): Promise<CdpParams> {
    if (opts.countdown?.expired) {
      throw new ConversionTimeoutError(`The conversion timed out before '${method}' was sent`, { method });
    }
    if (this._closed) {
      throw new ProtocolConnectionError(ErrorCode.CONNECTION_CLOSED, `Can't send '${method}', the DevTools connection is closed`, { method });
    }

    const id = ++this.msgId;
    const frame = JSON.stringify({ id, method, params: params ?? {} });
    const bound = waitBound(opts.timeoutMs, opts.countdown);
    const byCountdown = countdownBinds(opts);

    return new Promise<CdpParams>((resolve, reject) => {
      const request: PendingRequest = { method, resolve, reject };
      if (bound <= MAX_TIMER_MS) {
        request.timer = setTimeout(() => {
          this.pending.delete(id);
          reject(this.timeoutError(`'${method}'`, bound, byCountdown, opts.countdown));
        }, bound);
      }
      this.pending.set(id, request);
      if (this.logTraffic) this.logger.debug(`→ ${truncate(frame)}`);
      this.ws.send(frame, (err) => {
        if (!err) return;
        const stale = this.pending.get(id);
        if (!stale) return;
        this.pending.delete(id);
        clearTimeout(stale.timer);
        reject(new ProtocolConnectionError(ErrorCode.CONNECTION_CLOSED, `Could not send '${method}': ${err.message}`, { method }, { cause: err }));
      });
    });
  }

  /**
   * Registers a one-shot wait for an event, synchronously, so it can be set up
   * before the command that triggers it is sent. Throws `ProtocolError`
   * `SUBSCRIPTION_CONFLICT` when an equal wait is still active.
   */
  waitForEvent(matcher: EventMatcher, opts: WaitOptions & { signal?: AbortSignal } = {}): Promise<CdpParams> {
    const key = subscriptionKey(matcher);
    if (this.subscriptions.has(key)) {
      throw new ProtocolError(ErrorCode.SUBSCRIPTION_CONFLICT, `Already waiting for '${key}'`, { key });
    }
    if (opts.countdown?.expired) {
      throw new ConversionTimeoutError(`The conversion timed out before waiting for '${matcher.method}'`, { method: matcher.method });
    }
    if (this._closed) {
      throw new ProtocolConnectionError(ErrorCode.CONNECTION_CLOSED, `Can't wait for '${matcher.method}', the DevTools connection is closed`);
    }
    if (opts.signal?.aborted) {
      throw new ProtocolError(ErrorCode.ABORTED, `Wait for '${matcher.method}' was aborted`, { key });
    }

    const bound = waitBound(opts.timeoutMs, opts.countdown);
    const byCountdown = countdownBinds(opts);
    return new Promise<CdpParams>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const onAbort = () => {
        subscription.release();
        reject(new ProtocolError(ErrorCode.ABORTED, `Wait for '${matcher.method}' was aborted`, { key }));
      };
      const subscription: Subscription = {
        matcher,
        resolve,
        reject,
        release: () => {
          clearTimeout(timer);
          opts.signal?.removeEventListener('abort', onAbort);
          this.subscriptions.delete(key);
        },
      };
      if (bound <= MAX_TIMER_MS) {
        timer = setTimeout(() => {
          subscription.release();
          reject(this.timeoutError(`event '${matcher.method}'`, bound, byCountdown, opts.countdown));
        }, bound);
      }
      opts.signal?.addEventListener('abort', onAbort, { once: true });
      this.subscriptions.set(key, subscription);
    });
  }

  /** Calls `listener` for every `method` event until the returned function is called. */
  on(method: string, listener: EventListener): () => void {
    let set = this.listeners.get(method);
    if (!set) {
      set = new Set();
      this.listeners.set(method, set);
    }
    set.add(listener);
    return () => {
      const current = this.listeners.get(method);
      current?.delete(listener);
      if (current?.size === 0) this.listeners.delete(method);
    };
  }

  /** Fails every pending wait and closes the socket. Terminates it if the close handshake takes over a second. */
  close(): Promise<void> {
    if (this.closing) return this.closing;
    this.teardown('DevTools connection was closed');
    this.closing = new Promise<void>((resolve) => {
      if (this.ws.readyState === WebSocket.CLOSED) {
        resolve();
        return;
      }
      const timer = setTimeout(() => {
        this.ws.terminate();
        resolve();
      }, CLOSE_GRACE_MS);
      timer.unref();
      this.ws.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      this.ws.close();
    });
    return this.closing;
  }

  private timeoutError(what: string, bound: number, byCountdown: boolean, countdown?: CountdownTimer): Error {
    if (countdown && (byCountdown || countdown.expired)) {
      return new ConversionTimeoutError(`The conversion timed out after ${countdown.budgetMs} ms while waiting for ${what}`, {
        budgetMs: countdown.budgetMs,
      });
    }
    return new ProtocolTimeoutError(`Timed out after ${bound} ms waiting for ${what}`, { timeoutMs: bound });
  }

  private receive(raw: string): void {
    if (this.logTraffic) this.logger.debug(`← ${truncate(raw)}`);
    let message: unknown;
    try {
      message = JSON.parse(raw);
    } catch (err) {
      this.dropFrame(new ProtocolParseError('Inbound DevTools frame is not JSON', { frame: truncate(raw) }, { cause: err }));
      return;
    }
    if (!isRecord(message)) {
      this.dropFrame(new ProtocolParseError('Inbound DevTools frame is not an object', { frame: truncate(raw) }));
      return;
    }
    if (typeof message.id === 'number') {
      this.deliverReply(message.id, message);
      return;
    }
    if (typeof message.method === 'string') {
      this.deliverEvent(message.method, isRecord(message.params) ? message.params : {});
      return;
    }
    this.dropFrame(new ProtocolParseError('Inbound DevTools frame is neither a reply nor an event', { frame: truncate(raw) }));
  }

  private dropFrame(err: ProtocolParseError): void {
    this.logger.warn(err.message, err.context);
  }

  private deliverReply(id: number, message: Record<string, unknown>): void {
    const request = this.pending.get(id);
    if (!request) {
      this.logger.debug(`Dropped reply for unknown id ${id}`);
      return;
    }
    this.pending.delete(id);
    clearTimeout(request.timer);
    const error = message.error;
    if (isRecord(error)) {
      const text = typeof error.message === 'string' ? error.message : 'unknown error';
      request.reject(new ProtocolError(ErrorCode.COMMAND_FAILED, `${request.method} failed: ${text}`, {
        method: request.method,
        code: error.code,
        message: text,
        data: error.data,
      }));
      return;
    }
    request.resolve(isRecord(message.result) ? message.result : {});
  }

  private deliverEvent(method: string, params: CdpParams): void {
    const listeners = this.listeners.get(method);
    if (listeners) {
      for (const listener of [...listeners]) this.invoke(method, listener, params);
    }
    for (const subscription of this.subscriptions.values()) {
      if (!matches(subscription.matcher, method, params)) continue;
      subscription.release();
      subscription.resolve(params);
      return;
    }
    if (!listeners && this.logTraffic) this.logger.debug(`Unhandled event ${method}`);
  }

  private invoke(method: string, listener: EventListener, params: CdpParams): void {
    try {
      const result = listener(params);
      if (result instanceof Promise) {
        result.catch((err: unknown) => this.logger.warn(`Listener for ${method} failed: ${describeError(err)}`));
      }
    } catch (err) {
      this.logger.warn(`Listener for ${method} failed: ${describeError(err)}`);
    }
  }

  private teardown(reason: string): void {
    if (this._closed) return;
    this._closed = true;
    for (const [, request] of this.pending) {
      clearTimeout(request.timer);
      request.reject(new ProtocolConnectionError(ErrorCode.CONNECTION_CLOSED, `${reason} while waiting for '${request.method}'`));
    }
    this.pending.clear();
    for (const subscription of [...this.subscriptions.values()]) {
      subscription.release();
      subscription.reject(new ProtocolConnectionError(ErrorCode.CONNECTION_CLOSED, `${reason} while waiting for '${subscription.matcher.method}'`));
    }
    this.listeners.clear();
  }
}

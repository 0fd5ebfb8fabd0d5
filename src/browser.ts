import type winston from 'winston';
import { CdpConnection, expectString, type WaitOptions } from './connection.js';
import type { CountdownTimer } from './countdown-timer.js';
import { describeError } from './errors.js';
import type { ControlEndpoint } from './types.js';

const BROWSER_CLOSE_TIMEOUT_MS = 1_000;
const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

export interface BrowserClientOptions {
  logger: winston.Logger;
  /** Log every frame sent and received at `debug`. Default: `false` */
  logTraffic?: boolean;
  /** Bound on each WebSocket handshake and on each setup command. Default: `10000` */
  connectTimeoutMs?: number;
  /** Conversion budget that also bounds every step of the setup */
  countdown?: CountdownTimer;
}

/**
 * The browser-level socket plus the one page target every conversion renders in.
 *
 * @example
 * ```ts
 * const client = await BrowserClient.connect(endpoint, { logger });
 * await client.page.send('Page.navigate', { url: 'https://example.com' });
 * await client.close();
 * ```
 */
export class BrowserClient {
  readonly browser: CdpConnection;
  readonly page: CdpConnection;
  readonly targetId: string;
  private readonly logger: winston.Logger;
  private closing: Promise<void> | null = null;

  private constructor(browser: CdpConnection, page: CdpConnection, targetId: string, logger: winston.Logger) {
    this.browser = browser;
    this.page = page;
    this.targetId = targetId;
    this.logger = logger;
  }

  /**
   * Connects to the browser endpoint, opens a blank page target and attaches
   * to it with page and lifecycle events enabled.
   */
  static async connect(endpoint: ControlEndpoint, opts: BrowserClientOptions): Promise<BrowserClient> {
    const connectTimeoutMs = opts.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    const connectOpts = { logger: opts.logger, logTraffic: opts.logTraffic, connectTimeoutMs, countdown: opts.countdown };
    const bounded: WaitOptions = { timeoutMs: connectTimeoutMs, countdown: opts.countdown };
    const browser = await CdpConnection.connect(endpoint.url, connectOpts);
    let page: CdpConnection | undefined;
    try {
      const created = await browser.send('Target.createTarget', { url: 'about:blank' }, bounded);
      const targetId = expectString(created, 'targetId', 'Target.createTarget');
      const pageUrl = new URL(endpoint.url);
      pageUrl.pathname = `/devtools/page/${targetId}`;
      page = await CdpConnection.connect(pageUrl.toString(), connectOpts);
      await page.send('Page.enable', undefined, bounded);
      await page.send('Page.setLifecycleEventsEnabled', { enabled: true }, bounded);
      opts.logger.info(`Attached to page target ${targetId}`);
      return new BrowserClient(browser, page, targetId, opts.logger);
    } catch (err) {
      await Promise.all([page?.close(), browser.close()]);
      throw err;
    }
  }

  get closed(): boolean {
    return this.browser.closed && this.page.closed;
  }

  /**
   * Asks the browser to close, waiting at most a second for the reply, then
   * closes both sockets. Never throws.
   */
  close(): Promise<void> {
    if (!this.closing) this.closing = this.doClose();
    return this.closing;
  }

  private async doClose(): Promise<void> {
    if (!this.browser.closed) {
      try {
        await this.browser.send('Browser.close', undefined, { timeoutMs: BROWSER_CLOSE_TIMEOUT_MS });
      } catch (err) {
        this.logger.info(`Browser.close did not complete: ${describeError(err)}`);
      }
    }
    await Promise.all([this.page.close(), this.browser.close()]);
  }
}

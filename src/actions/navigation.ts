import type winston from 'winston';
import { type CdpConnection, type CdpParams, isRecord, settle } from '../connection.js';
import type { CountdownTimer } from '../countdown-timer.js';
import { ErrorCode, NavigationError, ProtocolError, describeError } from '../errors.js';
import type { NetworkTrafficEntry } from '../types.js';
import { isBlocked } from '../url-filter.js';

const FETCH_DISABLE_TIMEOUT_MS = 5_000;

export interface NavigateOptions {
  logger: winston.Logger;
  countdown?: CountdownTimer;
  /** Let Chrome serve from its cache. Default: `true` */
  useCache?: boolean;
  /** Compiled URL blacklist; requests it matches fail with `BlockedByClient` */
  blacklist?: readonly RegExp[];
  /** Exact URLs the blacklist never blocks */
  allowList?: ReadonlySet<string>;
  logNetworkTraffic?: boolean;
  /** Bound on the DOMContentLoaded and load waits */
  navigationTimeoutMs?: number;
  /** Stop waiting for the load event this long after DOMContentLoaded */
  mediaLoadTimeoutMs?: number;
}

function frameIdOf(tree: CdpParams): string {
  const frameTree = tree.frameTree;
  const frame = isRecord(frameTree) ? frameTree.frame : undefined;
  const id = isRecord(frame) ? frame.id : undefined;
  if (typeof id !== 'string') {
    throw new ProtocolError(ErrorCode.COMMAND_FAILED, 'Page.getFrameTree returned no main frame');
  }
  return id;
}

/** Replaces the page's document with `html`. No load events are awaited. */
export async function setDocumentContent(
  page: CdpConnection,
  html: string,
  opts: { countdown?: CountdownTimer } = {},
): Promise<void> {
  const tree = await page.send('Page.getFrameTree', undefined, { countdown: opts.countdown });
  await page.send('Page.setDocumentContent', { frameId: frameIdOf(tree), html }, { countdown: opts.countdown });
}

function describeTraffic(entry: NetworkTrafficEntry): string {
  switch (entry.kind) {
    case 'request': return `Request ${entry.method ?? 'GET'} ${entry.url}`;
    case 'response': return `Response ${entry.method ?? 'GET'} ${entry.status ?? '?'} ${entry.url}`;
    case 'failed': return `Failed ${entry.url}: ${entry.errorText ?? 'unknown error'}`;
    case 'blocked': return `Blocked ${entry.url}`;
    case 'allowed': return `Allowed ${entry.url}`;
  }
}

function stringField(source: unknown, key: string): string | undefined {
  if (!isRecord(source)) return undefined;
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

/** Answers every paused request: fail it when blacklisted, let it through otherwise. */
async function interceptRequest(
  page: CdpConnection,
  params: CdpParams,
  opts: { blacklist: readonly RegExp[]; allowList: ReadonlySet<string>; logger: winston.Logger; logTraffic: boolean },
): Promise<void> {
  const requestId = stringField(params, 'requestId');
  const url = stringField(params.request, 'url');
  if (requestId === undefined || url === undefined) {
    opts.logger.warn('Fetch.requestPaused without a request id or url');
    return;
  }
  if (isBlocked(url, opts.blacklist, opts.allowList)) {
    opts.logger.info(describeTraffic({ kind: 'blocked', url }));
    await page.send('Fetch.failRequest', { requestId, errorReason: 'BlockedByClient' });
    return;
  }
  if (opts.logTraffic) opts.logger.info(describeTraffic({ kind: 'allowed', url }));
  await page.send('Fetch.continueRequest', { requestId });
}

function listenToTraffic(page: CdpConnection, logger: winston.Logger): Array<() => void> {
  const requests = new Map<string, { url: string; method?: string }>();
  const requestOf = (params: CdpParams) => {
    const requestId = stringField(params, 'requestId');
    return requestId !== undefined ? requests.get(requestId) : undefined;
  };
  return [
    page.on('Network.requestWillBeSent', (params) => {
      const url = stringField(params.request, 'url') ?? '';
      const method = stringField(params.request, 'method');
      const requestId = stringField(params, 'requestId');
      if (requestId) requests.set(requestId, { url, method });
      logger.info(describeTraffic({ kind: 'request', url, method }));
    }),
    page.on('Network.responseReceived', (params) => {
      const response = params.response;
      const request = requestOf(params);
      const status = isRecord(response) && typeof response.status === 'number' ? response.status : undefined;
      const url = stringField(response, 'url') ?? request?.url ?? '';
      logger.info(describeTraffic({ kind: 'response', url, method: request?.method, status }));
    }),
    page.on('Network.loadingFailed', (params) => {
      const url = requestOf(params)?.url ?? '';
      logger.info(describeTraffic({ kind: 'failed', url, errorText: stringField(params, 'errorText') }));
    }),
  ];
}

const MEDIA_TIMEOUT = Symbol('media-timeout');

function withMediaTimeout<T>(promise: Promise<T>, ms: number): Promise<T | typeof MEDIA_TIMEOUT> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<typeof MEDIA_TIMEOUT>(resolve => {
    timer = setTimeout(() => resolve(MEDIA_TIMEOUT), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Loads `url` in the page and waits until it is ready to render.
 *
 * Blacklisted requests are failed through the Fetch domain while the page
 * loads. DOMContentLoaded of the main frame is a hard wait. The load event is a soft wait when
 * `mediaLoadTimeoutMs` is set: once that elapses after DOMContentLoaded the
 * page is rendered as it is.
 */
export async function navigateTo(page: CdpConnection, url: string, opts: NavigateOptions): Promise<void> {
  const { countdown, logger } = opts;
  const bounded = { countdown, timeoutMs: opts.navigationTimeoutMs };
  const blacklist = opts.blacklist ?? [];
  const allowList = opts.allowList ?? new Set<string>();
  const unsubscribe: Array<() => void> = [];
  const release = new AbortController();
  let intercepting = false;

  try {
    const frameId = frameIdOf(await page.send('Page.getFrameTree', undefined, bounded));
    await page.send('Network.enable', undefined, bounded);
    await page.send('Network.setCacheDisabled', { cacheDisabled: opts.useCache === false }, bounded);

    if (blacklist.length) {
      const logTraffic = opts.logNetworkTraffic ?? false;
      unsubscribe.push(page.on('Fetch.requestPaused', params => interceptRequest(page, params, { blacklist, allowList, logger, logTraffic })));
      await page.send('Fetch.enable', { patterns: [{ urlPattern: '*' }] }, bounded);
      intercepting = true;
    }
    if (opts.logNetworkTraffic) unsubscribe.push(...listenToTraffic(page, logger));

    // child frames report DOMContentLoaded too
    const domReady = settle(page.waitForEvent(
      { method: 'Page.lifecycleEvent', params: { name: 'DOMContentLoaded', frameId } },
      { ...bounded, signal: release.signal },
    ));
    const loaded = settle(page.waitForEvent({ method: 'Page.loadEventFired' }, { ...bounded, signal: release.signal }));

    logger.info(`Navigating to '${url}'`);
    const result = await page.send('Page.navigate', { url }, bounded);
    const errorText = stringField(result, 'errorText');
    if (errorText) {
      throw new NavigationError(`Navigation to '${url}' failed: ${errorText}`, { url, errorText });
    }

    const dom = await domReady;
    if (!dom.ok) throw dom.error;
    logger.info('DOMContentLoaded fired');

    if (opts.mediaLoadTimeoutMs !== undefined) {
      const outcome = await withMediaTimeout(loaded, opts.mediaLoadTimeoutMs);
      if (outcome === MEDIA_TIMEOUT) {
        logger.warn(`Media did not finish loading within ${opts.mediaLoadTimeoutMs} ms, rendering what is there`);
        return;
      }
      if (!outcome.ok) throw outcome.error;
    } else {
      const outcome = await loaded;
      if (!outcome.ok) throw outcome.error;
    }
    logger.info('Page load event fired');
  } finally {
    release.abort();
    if (intercepting && !page.closed) {
      try {
        await page.send('Fetch.disable', undefined, { timeoutMs: FETCH_DISABLE_TIMEOUT_MS });
      } catch (err) {
        logger.warn(`Could not disable request interception: ${describeError(err)}`);
      }
    }
    for (const off of unsubscribe) off();
  }
}

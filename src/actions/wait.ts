import type winston from 'winston';
import { type CdpConnection, isRecord } from '../connection.js';
import { ProtocolTimeoutError } from '../errors.js';

export const WINDOW_STATUS_POLL_MS = 10;

/**
 * Polls `window.status` until it equals `status`. Returns `false` when
 * `timeoutMs` passes first. Not bounded by any conversion countdown: callers
 * pause theirs around it.
 */
export async function waitForWindowStatus(
  page: CdpConnection,
  status: string,
  timeoutMs: number,
  opts: { logger?: winston.Logger } = {},
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    let value: unknown;
    try {
      const reply = await page.send(
        'Runtime.evaluate',
        { expression: 'window.status', returnByValue: true },
        { timeoutMs: Math.max(1, deadline - Date.now()) },
      );
      value = isRecord(reply.result) ? reply.result.value : undefined;
    } catch (err) {
      if (err instanceof ProtocolTimeoutError) return false;
      throw err;
    }
    if (value === status) {
      opts.logger?.info(`window.status is '${status}'`);
      return true;
    }
    if (Date.now() >= deadline) return false;
    await new Promise(r => setTimeout(r, WINDOW_STATUS_POLL_MS));
  }
}

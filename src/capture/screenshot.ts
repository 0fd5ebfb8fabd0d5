import type { CdpConnection } from '../connection.js';
import type { CountdownTimer } from '../countdown-timer.js';
import { ConfigurationError, ErrorCode } from '../errors.js';
import { decodeBase64Data } from './decode.js';

export async function takeScreenshot(
  page: CdpConnection,
  opts: {
    type?: 'png' | 'jpeg';
    /** JPEG only, 0-100 */
    quality?: number;
    fullPage?: boolean;
    countdown?: CountdownTimer;
  } = {},
): Promise<{ buffer: Buffer }> {
  const format = opts.type ?? 'png';
  const params: Record<string, unknown> = { format, captureBeyondViewport: Boolean(opts.fullPage) };
  if (opts.quality !== undefined) {
    if (format !== 'jpeg') throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, 'quality is only supported for jpeg screenshots');
    if (!Number.isInteger(opts.quality) || opts.quality < 0 || opts.quality > 100) {
      throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, `quality has to be an integer from 0 to 100, got ${opts.quality}`);
    }
    params.quality = opts.quality;
  }
  const reply = await page.send('Page.captureScreenshot', params, { countdown: opts.countdown });
  return { buffer: decodeBase64Data(reply, 'Page.captureScreenshot') };
}

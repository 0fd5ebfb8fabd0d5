import type { CdpConnection } from '../connection.js';
import type { CountdownTimer } from '../countdown-timer.js';
import { ConversionError, ErrorCode } from '../errors.js';

/** Captures the loaded page as MHTML. Chrome returns it as text; each char is one byte. */
export async function captureMhtml(
  page: CdpConnection,
  opts: { countdown?: CountdownTimer } = {},
): Promise<{ buffer: Buffer }> {
  const reply = await page.send('Page.captureSnapshot', { format: 'mhtml' }, { countdown: opts.countdown });
  if (typeof reply.data !== 'string') {
    throw new ConversionError(ErrorCode.RENDER_FAILED, 'Page.captureSnapshot returned no data');
  }
  return { buffer: Buffer.from(reply.data, 'latin1') };
}

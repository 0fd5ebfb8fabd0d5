import type { CdpConnection } from '../connection.js';
import type { CountdownTimer } from '../countdown-timer.js';
import { runJavascript } from '../actions/evaluate.js';
import { GRAYSCALE_SCRIPT, type PageSettings, toPrintToPdfParams } from '../page-settings.js';
import { decodeBase64Data } from './decode.js';

/** Prints the loaded page to PDF bytes. Grayscale is applied as a page style first. */
export async function printToPdf(
  page: CdpConnection,
  settings: PageSettings = {},
  opts: { countdown?: CountdownTimer } = {},
): Promise<{ buffer: Buffer }> {
  const params = toPrintToPdfParams(settings);
  if (settings.colorMode === 'grayscale') await runJavascript(page, GRAYSCALE_SCRIPT, opts);
  const reply = await page.send('Page.printToPDF', params, { countdown: opts.countdown });
  return { buffer: decodeBase64Data(reply, 'Page.printToPDF') };
}

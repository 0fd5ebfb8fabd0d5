import { type CdpConnection, isRecord } from '../connection.js';
import type { CountdownTimer } from '../countdown-timer.js';
import { ConversionError, ErrorCode } from '../errors.js';

function exceptionText(details: Record<string, unknown>): string {
  const exception = details.exception;
  if (isRecord(exception) && typeof exception.description === 'string') return exception.description;
  if (typeof details.text === 'string') return details.text;
  return 'unknown error';
}

/**
 * Runs `script` in the page and waits for the promise it returns, if any.
 * The result is discarded; a thrown exception fails with `SCRIPT_FAILED`.
 */
export async function runJavascript(
  page: CdpConnection,
  script: string,
  opts: { countdown?: CountdownTimer } = {},
): Promise<void> {
  const reply = await page.send('Runtime.evaluate', { expression: script, awaitPromise: true }, { countdown: opts.countdown });
  if (isRecord(reply.exceptionDetails)) {
    const text = exceptionText(reply.exceptionDetails);
    throw new ConversionError(ErrorCode.SCRIPT_FAILED, `Script failed: ${text}`, { exception: text });
  }
}

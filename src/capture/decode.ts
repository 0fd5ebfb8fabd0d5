import type { CdpParams } from '../connection.js';
import { ConversionError, ErrorCode } from '../errors.js';

/** Decodes the base64 `data` field of a capture command's result. */
export function decodeBase64Data(reply: CdpParams, method: string): Buffer {
  const data = reply.data;
  if (typeof data !== 'string') {
    throw new ConversionError(ErrorCode.RENDER_FAILED, `${method} returned no data`, { method });
  }
  return Buffer.from(data, 'base64');
}

/**
 * Assuan data line codec.
 *
 * pinentry answers GETPIN with a `D <payload>` line whose payload escapes
 * `%`, CR, LF and other bytes as `%XX`.
 * https://www.gnupg.org/documentation/manuals/assuan/Server-responses.html
 */

import { TextDecoder } from 'util';

export const ASSUAN_DATA_PREFIX = 'D ';

const HEX_PAIR = /^[0-9a-fA-F]{2}$/;
const PERCENT = 0x25;

/**
 * Decode an Assuan data payload. Returns `undefined` for a malformed escape
 * or when the bytes are not valid UTF-8; never a partial result.
 */
export function decodeAssuanData(encoded: string): string | undefined {
  const bytes = Buffer.from(encoded, 'utf8');
  const decoded: number[] = [];
  let i = 0;
  while (i < bytes.length) {
    if (bytes[i] !== PERCENT) {
      decoded.push(bytes[i]);
      i += 1;
      continue;
    }
    i += 1;
    const hex = bytes.subarray(i, i + 2).toString('latin1');
    if (!HEX_PAIR.test(hex)) {
      return undefined;
    }
    decoded.push(Number.parseInt(hex, 16));
    i += 2;
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(Uint8Array.from(decoded));
  } catch {
    return undefined;
  }
}

/**
 * Escape text for an Assuan data line. Printable ASCII other than `%` is
 * kept as is.
 */
export function encodeAssuanData(text: string): string {
  let out = '';
  for (const byte of Buffer.from(text, 'utf8')) {
    if (byte >= 0x20 && byte < 0x7f && byte !== PERCENT) {
      out += String.fromCharCode(byte);
    } else {
      out += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  }
  return out;
}

import { TextDecoder } from 'util';
import { DecodeError } from '../errors';

const ALPHABET = /^[A-Za-z0-9_-]*$/;

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Encodes arbitrary bytes as unpadded base64url, safe for URLs, JSON and
 * any other text transport.
 */
export function encode(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64url');
}

/**
 * Strict inverse of {@link encode}. Padded input is accepted as well.
 *
 * Node's own base64 decoder silently skips characters it does not know, so
 * the input is validated up front and checked to be canonical.
 */
export function decode(text: string): Buffer {
  const body = stripPadding(text);

  if (!ALPHABET.test(body)) {
    throw new DecodeError('payload contains characters outside base64url');
  }
  if (body.length % 4 === 1) {
    throw new DecodeError(`payload has an impossible length (${text.length})`);
  }

  const bytes = Buffer.from(body, 'base64url');
  if (bytes.toString('base64url') !== body) {
    throw new DecodeError('payload is not canonical base64url');
  }
  return bytes;
}

/**
 * Strict UTF-8. A leading byte order mark is kept as content.
 */
export function decodeText(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch {
    throw new DecodeError('content is not valid UTF-8');
  }
}

function stripPadding(text: string): string {
  const firstPad = text.indexOf('=');
  if (firstPad === -1) {
    return text;
  }

  const padding = text.slice(firstPad);
  if (!/^={1,2}$/.test(padding) || text.length % 4 !== 0) {
    throw new DecodeError('payload has malformed padding');
  }
  return text.slice(0, firstPad);
}

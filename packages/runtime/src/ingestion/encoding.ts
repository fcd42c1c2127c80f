// Byte decoding for uploaded campaign files

import { IngestionError } from '../errors.js';

export const DEFAULT_ENCODING = 'utf-8';

type ByteOrderMark = {
  encoding: string;
  bytes: number[];
};

// Longest marks first so UTF-8's three bytes are checked before UTF-16's two
const BYTE_ORDER_MARKS: ByteOrderMark[] = [
  { encoding: 'utf-8', bytes: [0xef, 0xbb, 0xbf] },
  { encoding: 'utf-16le', bytes: [0xff, 0xfe] },
  { encoding: 'utf-16be', bytes: [0xfe, 0xff] },
];

/**
 * Find the encoding announced by a byte-order mark, if any.
 */
export function sniffByteOrderMark(bytes: Uint8Array): string | undefined {
  const mark = BYTE_ORDER_MARKS.find(
    (candidate) =>
      bytes.length >= candidate.bytes.length &&
      candidate.bytes.every((byte, index) => bytes[index] === byte)
  );
  return mark?.encoding;
}

/**
 * Pick the encoding to decode with.
 *
 * A byte-order mark wins over the caller's guess; without either the
 * bytes are read as UTF-8.
 */
export function resolveEncoding(bytes: Uint8Array, hint?: string | null): string {
  const fromMark = sniffByteOrderMark(bytes);
  if (fromMark) {
    return fromMark;
  }

  const label = hint?.trim().toLowerCase();
  return label ? label : DEFAULT_ENCODING;
}

/**
 * Decode bytes to text. Malformed sequences become U+FFFD instead of failing.
 *
 * @throws IngestionError if the encoding label is not supported
 */
export function decodeBytes(bytes: Uint8Array, encoding: string): string {
  let decoder: InstanceType<typeof TextDecoder>;
  try {
    decoder = new TextDecoder(encoding, { fatal: false });
  } catch (error) {
    throw new IngestionError(`Unsupported character encoding: ${encoding}`, { cause: error });
  }

  return decoder.decode(bytes);
}

/** bcrypt only looks at the first 72 bytes of its input. */
export const BCRYPT_MAX_BYTES = 72;

/**
 * Cut `value` to at most `maxBytes` UTF-8 bytes without splitting a character.
 * A multi-byte character that would straddle the limit is dropped entirely.
 */
export function truncateToByteLimit(value: string, maxBytes: number = BCRYPT_MAX_BYTES): string {
  const encoded = Buffer.from(value, 'utf8');
  if (encoded.length <= maxBytes) {
    return value;
  }

  let end = maxBytes;
  // Back off over continuation bytes (10xxxxxx) to the start of the straddling character
  while (end > 0 && (encoded[end] & 0xc0) === 0x80) {
    end--;
  }
  return encoded.subarray(0, end).toString('utf8');
}

export function utf8ByteLength(value: string): number {
  return Buffer.byteLength(value, 'utf8');
}

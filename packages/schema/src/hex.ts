/**
 * Hex byte codecs
 *
 * Byte fields cross the wire as lowercase hex without a prefix.
 */

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

/**
 * Convert Uint8Array to lowercase hex string
 *
 * @param bytes - Byte array
 * @returns Lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Convert hex string to Uint8Array
 *
 * @param hex - Hex string (either case, even length)
 * @returns Uint8Array
 */
export function hexToBytes(hex: string): Uint8Array {
  if (!HEX_PATTERN.test(hex)) {
    throw new Error('Invalid hex string');
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

/**
 * Check whether a string is even-length hex.
 */
export function isHex(value: string): boolean {
  return HEX_PATTERN.test(value);
}

/**
 * Encode a UTF-8 string as bytes. Storage references are often
 * human-readable blob IDs.
 */
export function utf8Bytes(value: string): Uint8Array {
  return new TextEncoder().encode(value);
}

type CryptoLike = {
  randomUUID?(): string;
  getRandomValues?(b: Uint8Array): Uint8Array;
};

/**
 * Random (version 4) UUID generator.
 *
 * Prefers `crypto.randomUUID` and falls back to filling the bytes with
 * `crypto.getRandomValues`.
 */
export function uuidv4(): string {
  const cryptoObj = (globalThis as { crypto?: CryptoLike }).crypto;
  if (cryptoObj && typeof cryptoObj.randomUUID === 'function') {
    return cryptoObj.randomUUID();
  }
  if (!cryptoObj || typeof cryptoObj.getRandomValues !== 'function') {
    throw new Error('No secure random source available for UUID generation');
  }

  const bytes = new Uint8Array(16);
  cryptoObj.getRandomValues(bytes);

  // version = 4 (0b0100)
  bytes[6] = (bytes[6] & 0x0f) | 0x40;
  // variant = RFC 4122 (10xxxxxx)
  bytes[8] = (bytes[8] & 0x3f) | 0x80;

  const hex = Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('');

  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

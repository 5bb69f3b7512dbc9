import { createHash } from 'node:crypto';

/**
 * 64-bit content fingerprint of an RGBA image: the first eight bytes
 * (little-endian) of a SHA-256 over width, height and pixel data.
 */
export function fingerprint(width: number, height: number, data: Uint8Array): bigint {
  const header = Buffer.alloc(8);
  header.writeInt32LE(width, 0);
  header.writeInt32LE(height, 4);

  const digest = createHash('sha256').update(header).update(data).digest();
  return digest.readBigUInt64LE(0);
}

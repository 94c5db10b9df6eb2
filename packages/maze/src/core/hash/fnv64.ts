/**
 * FNV-1a 64-bit hash implementation
 */

const FNV64_OFFSET_BASIS = 14695981039346656037n;
const FNV64_PRIME = 1099511628211n;
const MASK_64 = (1n << 64n) - 1n;

/**
 * Incremental FNV-1a 64-bit hasher
 */
export class FNV64Hasher {
  private hash = FNV64_OFFSET_BASIS;

  updateByte(byte: number): this {
    this.hash ^= BigInt(byte & 0xff);
    this.hash = (this.hash * FNV64_PRIME) & MASK_64;
    return this;
  }

  updateBytes(data: Uint8Array): this {
    for (const byte of data) {
      this.updateByte(byte);
    }
    return this;
  }

  /**
   * Add a 32-bit integer (little-endian)
   */
  updateInt32(value: number): this {
    const v = value >>> 0;
    return this.updateByte(v)
      .updateByte(v >>> 8)
      .updateByte(v >>> 16)
      .updateByte(v >>> 24);
  }

  /**
   * Final hash as a 16-character hex string
   */
  digest(): string {
    return this.hash.toString(16).padStart(16, "0");
  }
}

export function fnv64Hash(data: Uint8Array): string {
  return new FNV64Hasher().updateBytes(data).digest();
}

const FNV_OFFSET_BASIS_64 = 0xcbf29ce484222325n;
const FNV_PRIME_64 = 0x100000001b3n;
const UINT64_MASK = 0xffffffffffffffffn;

/**
 * FNV-1a over raw bytes, 64-bit. The basis is fixed, so the same bytes hash to the same value in
 * every process.
 */
export const fnv1a64 = (bytes: Uint8Array): bigint => {
  let hash = FNV_OFFSET_BASIS_64;
  for (const byte of bytes) {
    hash ^= BigInt(byte);
    hash = (hash * FNV_PRIME_64) & UINT64_MASK;
  }

  return hash;
};

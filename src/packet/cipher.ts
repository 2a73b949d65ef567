/**
 * XOR mask applied to UTF payloads inside packets. Masking is its own
 * inverse: `dst[i] = src[i] ^ MASK[i % 64]`.
 *
 * Three paths produce identical output. `scalar` walks bytes, `lane32` XORs
 * 32-bit words through Uint32Array views, and `block64` handles whole
 * 64-byte blocks as sixteen unrolled words. The word paths need both
 * buffers to start on a 4-byte boundary; whatever does not fill a word or
 * block is finished by the scalar path.
 */

export const MASK = Uint8Array.from([
  95, 203, 167, 179, 175, 91, 119, 195, 255, 235, 71, 211, 79, 123, 23, 227,
  159, 11, 231, 243, 239, 155, 183, 3, 63, 43, 135, 19, 143, 187, 87, 35,
  223, 75, 39, 51, 47, 219, 247, 67, 127, 107, 199, 83, 207, 251, 151, 99,
  31, 139, 103, 115, 111, 27, 55, 131, 191, 171, 7, 147, 15, 59, 215, 163,
]);

export const MASK_LENGTH = 64;

/** `@UTF` after masking, read as a little-endian u32. */
export const CIPHER_GUARD = 0xf5f39e1f;

// Native byte order on both sides keeps the word XOR equal to the byte XOR.
const MASK_WORDS = new Uint32Array(MASK.buffer, MASK.byteOffset, MASK_LENGTH / 4);

export type CipherStrategy = "scalar" | "lane32" | "block64";

export type CipherCapabilities = {
  scalar: true;
  lane32: boolean;
  block64: boolean;
};

export type CipherOptions = {
  /**
   * Forces a path. A path the buffers cannot take falls back to the widest
   * one they can.
   */
  strategy?: CipherStrategy;
};

const isWordAligned = (buffer: Uint8Array): boolean => buffer.byteOffset % 4 === 0;

export const detectCipherCapabilities = (src: Uint8Array, dst: Uint8Array): CipherCapabilities => {
  const aligned = isWordAligned(src) && isWordAligned(dst);
  return {
    scalar: true,
    lane32: aligned && src.length >= 4,
    block64: aligned && src.length >= MASK_LENGTH,
  };
};

export const selectCipherStrategy = (capabilities: CipherCapabilities): CipherStrategy => {
  if (capabilities.block64) return "block64";
  if (capabilities.lane32) return "lane32";
  return "scalar";
};

const resolveStrategy = (src: Uint8Array, dst: Uint8Array, requested?: CipherStrategy): CipherStrategy => {
  const capabilities = detectCipherCapabilities(src, dst);
  if (requested !== undefined && capabilities[requested]) {
    return requested;
  }
  return selectCipherStrategy(capabilities);
};

const maskScalar = (src: Uint8Array, dst: Uint8Array, start: number): void => {
  for (let index = start; index < src.length; index += 1) {
    dst[index] = src[index] ^ MASK[index & 63];
  }
};

const wordViews = (src: Uint8Array, dst: Uint8Array, words: number): [Uint32Array, Uint32Array] => [
  new Uint32Array(src.buffer, src.byteOffset, words),
  new Uint32Array(dst.buffer, dst.byteOffset, words),
];

const maskLane32 = (src: Uint8Array, dst: Uint8Array): void => {
  const words = src.length >>> 2;
  const [source, target] = wordViews(src, dst, words);
  for (let index = 0; index < words; index += 1) {
    target[index] = source[index] ^ MASK_WORDS[index & 15];
  }
  maskScalar(src, dst, words << 2);
};

const maskBlock64 = (src: Uint8Array, dst: Uint8Array): void => {
  const blocks = src.length >>> 6;
  const [source, target] = wordViews(src, dst, blocks << 4);
  const [m0, m1, m2, m3, m4, m5, m6, m7, m8, m9, m10, m11, m12, m13, m14, m15] = MASK_WORDS;
  for (let base = 0; base < blocks << 4; base += 16) {
    target[base] = source[base] ^ m0;
    target[base + 1] = source[base + 1] ^ m1;
    target[base + 2] = source[base + 2] ^ m2;
    target[base + 3] = source[base + 3] ^ m3;
    target[base + 4] = source[base + 4] ^ m4;
    target[base + 5] = source[base + 5] ^ m5;
    target[base + 6] = source[base + 6] ^ m6;
    target[base + 7] = source[base + 7] ^ m7;
    target[base + 8] = source[base + 8] ^ m8;
    target[base + 9] = source[base + 9] ^ m9;
    target[base + 10] = source[base + 10] ^ m10;
    target[base + 11] = source[base + 11] ^ m11;
    target[base + 12] = source[base + 12] ^ m12;
    target[base + 13] = source[base + 13] ^ m13;
    target[base + 14] = source[base + 14] ^ m14;
    target[base + 15] = source[base + 15] ^ m15;
  }
  maskScalar(src, dst, blocks << 6);
};

/** Masks `src` into `dst`, which may be the same buffer. Returns the path taken. */
export const maskInto = (src: Uint8Array, dst: Uint8Array, options: CipherOptions = {}): CipherStrategy => {
  if (dst.length < src.length) {
    throw new RangeError(`mask target holds ${dst.length} bytes, source has ${src.length}`);
  }
  const strategy = resolveStrategy(src, dst, options.strategy);
  switch (strategy) {
    case "block64":
      maskBlock64(src, dst);
      break;
    case "lane32":
      maskLane32(src, dst);
      break;
    case "scalar":
      maskScalar(src, dst, 0);
      break;
  }
  return strategy;
};

export const maskBuffer = (src: Uint8Array, options: CipherOptions = {}): Buffer => {
  // Buffer.alloc never hands out pooled memory, so the target starts word aligned.
  const dst = Buffer.alloc(src.length);
  maskInto(src, dst, options);
  return dst;
};

/** True when `payload` starts with the masked form of `@UTF`. */
export const canUnmask = (payload: Uint8Array): boolean =>
  payload.length >= 4 &&
  new DataView(payload.buffer, payload.byteOffset, 4).getUint32(0, true) === CIPHER_GUARD;

export type TextEncodingName = "utf-8" | "utf-16le" | "utf-16be";

/** Number of leading bytes inspected by {@link detectTextEncoding}. */
export const ENCODING_SAMPLE_BYTES = 1024;

const TEXT_BYTES: ReadonlySet<number> = (() => {
  const allowed = new Set<number>([0x07, 0x08, 0x09, 0x0a, 0x0b, 0x0c, 0x0d, 0x1b]);
  for (let b = 0x20; b <= 0xff; b++) {
    if (b !== 0x7f) allowed.add(b);
  }
  return allowed;
})();

/** True when every byte of the sample is in the printable/control allowlist. */
export function looksLikeText(sample: Uint8Array): boolean {
  for (const byte of sample) {
    if (!TEXT_BYTES.has(byte)) return false;
  }
  return true;
}

/**
 * Guess how a requirement list is encoded.
 *
 * Fallback order:
 * 1. UTF-8, when the first {@link ENCODING_SAMPLE_BYTES} bytes are all text bytes.
 * 2. UTF-16 otherwise (NUL bytes from UTF-16 code units fail the allowlist).
 *    A `FE FF` byte order mark selects big-endian, anything else little-endian.
 */
export function detectTextEncoding(bytes: Uint8Array): TextEncodingName {
  if (looksLikeText(bytes.subarray(0, ENCODING_SAMPLE_BYTES))) return "utf-8";
  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) return "utf-16be";
  return "utf-16le";
}

/** Decode a manifest's bytes using {@link detectTextEncoding}. BOMs are dropped. */
export function decodeText(bytes: Uint8Array): { encoding: TextEncodingName; text: string } {
  const encoding = detectTextEncoding(bytes);
  return { encoding, text: new TextDecoder(encoding).decode(bytes) };
}

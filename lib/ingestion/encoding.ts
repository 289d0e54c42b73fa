export const DEFAULT_ENCODINGS: readonly string[] = ['utf-8', 'shift_jis', 'euc-jp'];

export interface DecodedText {
  text: string;
  encoding: string;
}

function tryDecode(buffer: Uint8Array, encoding: string): string | null {
  try {
    // A fatal decoder throws on the first invalid sequence; the utf-8 one also drops a leading BOM.
    return new TextDecoder(encoding, { fatal: true }).decode(buffer);
  } catch {
    // Invalid bytes, or a label this runtime has no converter for.
    return null;
  }
}

/**
 * Decode the whole buffer with the first candidate that accepts every byte.
 * Returns null when none does; there is no lossy fallback.
 */
export function decodeBuffer(
  buffer: Uint8Array,
  encodings: readonly string[] = DEFAULT_ENCODINGS
): DecodedText | null {
  for (const encoding of encodings) {
    const text = tryDecode(buffer, encoding);
    if (text !== null) {
      return { text, encoding };
    }
  }
  return null;
}

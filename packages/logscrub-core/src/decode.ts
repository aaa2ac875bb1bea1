const strictDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: false });
const lenientDecoder = new TextDecoder('utf-8', { fatal: false, ignoreBOM: false });

export interface DecodedText {
  text: string;
  /** True when invalid sequences were replaced with U+FFFD. */
  lossy: boolean;
}

/**
 * Decode UTF-8, falling back to replacement characters for byte sequences
 * that are not valid UTF-8.
 */
export function decodeText(bytes: Uint8Array): DecodedText {
  try {
    return { text: strictDecoder.decode(bytes), lossy: false };
  } catch {
    return { text: lenientDecoder.decode(bytes), lossy: true };
  }
}

/** Split on `\n`, dropping a trailing `\r` and the empty piece after a final newline. */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

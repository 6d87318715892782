/**
 * Byte → text decoding for delimited and plain-text uploads.
 */

const BINARY_CHAR_RATIO = 0.1;

function decodeWithFallback(bytes: Uint8Array): string {
  if (bytes[0] === 0xff && bytes[1] === 0xfe) {
    return new TextDecoder('utf-16le').decode(bytes);
  }
  if (bytes[0] === 0xfe && bytes[1] === 0xff) {
    return new TextDecoder('utf-16be').decode(bytes);
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    // Not valid UTF-8: spreadsheet exports from older tools are usually cp1252
    return new TextDecoder('latin1').decode(bytes);
  }
}

/**
 * Decode uploaded bytes as text. Returns null when the content is binary
 * (control and NUL characters dominate).
 */
export function decodeText(bytes: Uint8Array): string | null {
  if (bytes.length === 0) return '';
  const text = decodeWithFallback(bytes);
  let suspicious = 0;
  for (const char of text) {
    const code = char.charCodeAt(0);
    if (code === 0 || code === 0xfffd || (code < 0x20 && char !== '\n' && char !== '\r' && char !== '\t')) {
      suspicious++;
    }
  }
  return text.length > 0 && suspicious / text.length > BINARY_CHAR_RATIO ? null : text;
}

/**
 * UTF-8 validation for text messages and close reasons
 */

const strictDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode strictly; undefined when the bytes are not well-formed UTF-8
 */
export function decodeUtf8(bytes: Uint8Array): string | undefined {
  try {
    return strictDecoder.decode(bytes);
  } catch {
    return undefined;
  }
}

export function isValidUtf8(bytes: Uint8Array): boolean {
  return decodeUtf8(bytes) !== undefined;
}

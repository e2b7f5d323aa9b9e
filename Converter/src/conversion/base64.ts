/**
 * Strict base64 handling. Buffer.from(..., 'base64') silently skips
 * characters outside the alphabet, so the shape is checked first.
 */

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

function compact(input: string): string {
  return input.replace(/\s+/g, '');
}

export function isValidBase64(input: string): boolean {
  const value = compact(input);
  return value.length > 0 && value.length % 4 === 0 && BASE64_PATTERN.test(value);
}

/** Decoded bytes, or null when the input is empty or not well-formed base64 */
export function decodeBase64Strict(input: string): Buffer | null {
  if (!isValidBase64(input)) return null;
  return Buffer.from(compact(input), 'base64');
}

/** Decoded length computed from the text alone, without allocating the bytes */
export function decodedLength(input: string): number {
  const value = compact(input);
  const padding = value.endsWith('==') ? 2 : value.endsWith('=') ? 1 : 0;
  return Math.max(0, Math.floor((value.length * 3) / 4) - padding);
}

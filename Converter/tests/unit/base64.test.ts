import { describe, it, expect } from 'vitest';
import { decodeBase64Strict, decodedLength, isValidBase64 } from '../../src/conversion/base64.js';

describe('decodeBase64Strict', () => {
  it('should return the original bytes for encoded PDF-like content', () => {
    const samples = [
      Buffer.from('%PDF-1.4\n%\xE2\xE3\xCF\xD3\n1 0 obj\n<<>>\nendobj\n%%EOF\n', 'latin1'),
      Buffer.from([0x25, 0x50, 0x44, 0x46]),
      Buffer.from([0x00, 0xff, 0x10]),
      Buffer.from([0x25, 0x50, 0x44, 0x46, 0x2d]),
    ];
    for (const bytes of samples) {
      expect(decodeBase64Strict(bytes.toString('base64'))).toEqual(bytes);
    }
  });

  it('should ignore whitespace such as line wrapping', () => {
    expect(decodeBase64Strict('JVBE\nRi0x\r\nLjQ=')?.toString('latin1')).toBe('%PDF-1.4');
  });

  it.each([
    ['empty string', ''],
    ['characters outside the alphabet', 'not-base64!!!'],
    ['length not a multiple of four', 'JVBER'],
    ['padding in the middle', 'JV=ERi0x'],
    ['too much padding', 'JVB==='],
    ['url-safe alphabet', 'JVBE_i0-'],
  ])('should reject %s', (_label, input) => {
    expect(decodeBase64Strict(input)).toBeNull();
  });
});

describe('isValidBase64', () => {
  it('should accept padded and unpadded-length input', () => {
    expect(isValidBase64('JVBERg==')).toBe(true);
    expect(isValidBase64('JVBERi0=')).toBe(true);
    expect(isValidBase64('JVBERi0x')).toBe(true);
  });
});

describe('decodedLength', () => {
  it('should account for padding', () => {
    expect(decodedLength('JVBERg==')).toBe(4);
    expect(decodedLength('JVBERi0=')).toBe(5);
    expect(decodedLength('JVBERi0x')).toBe(6);
    expect(decodedLength('')).toBe(0);
  });
});

import { describe, it, expect } from 'vitest';
import { admit, admitBytes, stripControlCharacters, DEFAULT_MAX_INPUT_LENGTH } from '../admission.js';
import { AdmissionError } from '../../utils/errors.js';

function admissionKind(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof AdmissionError) return error.kind;
    throw error;
  }
  return undefined;
}

describe('Request Admission', () => {
  describe('admit', () => {
    it('should admit ordinary text unchanged', () => {
      const request = admit('add "buy eggs" to my list');

      expect(request.rawInput).toBe('add "buy eggs" to my list');
      expect(request.sanitizedInput).toBe('add "buy eggs" to my list');
      expect(request.id).toBe('');
      expect(Object.isFrozen(request)).toBe(true);
    });

    it('should reject a 6000 character message as TooLong', () => {
      expect(admissionKind(() => admit('a'.repeat(6000)))).toBe('TooLong');
    });

    it('should accept a message of exactly the maximum length', () => {
      const request = admit('a'.repeat(DEFAULT_MAX_INPUT_LENGTH));
      expect(request.sanitizedInput).toHaveLength(5000);
    });

    it('should report the offending length in the message', () => {
      expect(() => admit('abcdef', undefined, { maxLength: 5 })).toThrow(
        'Message exceeds the maximum length of 5 characters (got 6)',
      );
    });

    it('should honour a declared length larger than the text', () => {
      expect(admissionKind(() => admit('short', 9000))).toBe('TooLong');
    });

    it('should reject an empty string', () => {
      expect(admissionKind(() => admit(''))).toBe('Empty');
    });

    it('should reject input that is only control characters and whitespace', () => {
      expect(admissionKind(() => admit('\u0000\u0007  \u001b'))).toBe('Empty');
    });

    it('should reject lone surrogates as InvalidEncoding', () => {
      expect(admissionKind(() => admit('bad \uD800 text'))).toBe('InvalidEncoding');
      expect(admissionKind(() => admit('\uDC00 leading'))).toBe('InvalidEncoding');
    });

    it('should accept surrogate pairs', () => {
      expect(admit('party 🎉').sanitizedInput).toBe('party 🎉');
    });

    it('should strip control characters but keep tabs and newlines', () => {
      const request = admit('line one\u0000\n\tline two\u007f\u0085\r');
      expect(request.sanitizedInput).toBe('line one\n\tline two\r');
      expect(request.rawInput).toBe('line one\u0000\n\tline two\u007f\u0085\r');
    });

    it('should stamp receivedAt from the injected clock', () => {
      const at = new Date('2026-01-02T03:04:05.000Z');
      expect(admit('hello', undefined, { now: () => at }).receivedAt).toBe(at);
    });
  });

  describe('admitBytes', () => {
    it('should decode valid UTF-8', () => {
      const bytes = new TextEncoder().encode('créer une tâche');
      expect(admitBytes(bytes).sanitizedInput).toBe('créer une tâche');
    });

    it('should reject malformed UTF-8 as InvalidEncoding', () => {
      const bytes = new Uint8Array([0x68, 0x69, 0xff, 0xfe]);
      expect(admissionKind(() => admitBytes(bytes))).toBe('InvalidEncoding');
    });
  });

  describe('stripControlCharacters', () => {
    it('should remove C0, DEL and C1 characters', () => {
      expect(stripControlCharacters('a\u0001b\u007fc\u009fd')).toBe('abcd');
    });
  });
});

import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import {
  applyOperator,
  decryptValue,
  encryptValue,
  hashValue,
  maskValue,
  type OperatorContext
} from '../src/operators.js';
import { ConfigError, ValidationError } from '../src/errors.js';
import type { DetectedSpan } from '../src/types/pii.js';

const KEY_128 = '0123456789abcdef';
const KEY_192 = '0123456789abcdef01234567';
const KEY_256 = '0123456789abcdef0123456789abcdef';

const SPAN: DetectedSpan = { entity_type: 'PERSON', start: 0, end: 10, score: 0.9, source_text: 'John Smith' };

function context(overrides: Partial<OperatorContext> = {}): OperatorContext {
  return { customOperators: new Map(), ...overrides };
}

describe('maskValue', () => {
  it('masks from the start', () => {
    expect(maskValue('4111111111111111', { masking_char: '*', chars_to_mask: 12, from_end: false }))
      .toBe('************1111');
  });

  it('masks from the end', () => {
    expect(maskValue('4111111111111111', { masking_char: '#', chars_to_mask: 4, from_end: true }))
      .toBe('411111111111####');
  });

  it('masks everything with -1 or a count larger than the value', () => {
    expect(maskValue('secret', { masking_char: '*', chars_to_mask: -1, from_end: false })).toBe('******');
    expect(maskValue('abc', { masking_char: '*', chars_to_mask: 10, from_end: true })).toBe('***');
  });

  it('masks nothing with a count of 0', () => {
    expect(maskValue('abc', { masking_char: '*', chars_to_mask: 0, from_end: false })).toBe('abc');
  });

  it('counts code points, not UTF-16 units', () => {
    expect(maskValue('😀😀ab', { masking_char: '*', chars_to_mask: 2, from_end: false })).toBe('**ab');
  });
});

describe('hashValue', () => {
  it('returns the hex digest of salt + value', () => {
    expect(hashValue('alice', 'sha256')).toBe(createHash('sha256').update('alice').digest('hex'));
    expect(hashValue('alice', 'sha256', 'pepper')).toBe(createHash('sha256').update('pepperalice').digest('hex'));
  });

  it('is stable across calls and sized by algorithm', () => {
    expect(hashValue('bob', 'sha512')).toBe(hashValue('bob', 'sha512'));
    expect(hashValue('bob', 'sha256')).toHaveLength(64);
    expect(hashValue('bob', 'sha512')).toHaveLength(128);
  });
});

describe('encryptValue / decryptValue', () => {
  it.each([KEY_128, KEY_192, KEY_256])('restores the original with key %s', (key) => {
    const token = encryptValue('alice@example.com', key);

    expect(decryptValue(token, key)).toBe('alice@example.com');
  });

  it('uses a fresh IV for every call', () => {
    expect(encryptValue('same', KEY_128)).not.toBe(encryptValue('same', KEY_128));
  });

  it('round-trips non-ASCII text', () => {
    expect(decryptValue(encryptValue('Zoë 😀', KEY_256), KEY_256)).toBe('Zoë 😀');
  });

  it('rejects keys of the wrong size', () => {
    expect(() => encryptValue('x', 'short')).toThrow(ConfigError);
    expect(() => encryptValue('x', 'short')).toThrow('Encryption key must be 16, 24 or 32 bytes long');
  });

  it('rejects a token too short to hold an IV and a block', () => {
    expect(() => decryptValue('abc', KEY_128)).toThrow(ValidationError);
    expect(() => decryptValue('abc', KEY_128)).toThrow('Encrypted value is malformed');
  });
});

describe('applyOperator', () => {
  it('applies replace and redact', () => {
    expect(applyOperator({ strategy: 'replace', parameters: { new_value: '<X>' } }, 'John Smith', SPAN, context()))
      .toBe('<X>');
    expect(applyOperator({ strategy: 'redact', parameters: {} }, 'John Smith', SPAN, context())).toBe('');
  });

  it('uses the engine key when the entry carries none', () => {
    const token = applyOperator({ strategy: 'encrypt', parameters: {} }, 'John Smith', SPAN, context({ encryptionKey: KEY_128 }));

    expect(decryptValue(token, KEY_128)).toBe('John Smith');
  });

  it('prefers the entry key over the engine key', () => {
    const token = applyOperator(
      { strategy: 'encrypt', parameters: { key: KEY_256 } },
      'John Smith',
      SPAN,
      context({ encryptionKey: KEY_128 })
    );

    expect(decryptValue(token, KEY_256)).toBe('John Smith');
  });

  it('throws ConfigError for encrypt without any key', () => {
    expect(() => applyOperator({ strategy: 'encrypt', parameters: {} }, 'John Smith', SPAN, context()))
      .toThrow('No encryption key configured for entity type "PERSON"');
  });

  it('calls a registered custom operator with the original and the span', () => {
    const initials = (original: string, span: DetectedSpan) =>
      `${span.entity_type}:${original.split(' ').map((part) => part[0]).join('')}`;
    const ctx = context({ customOperators: new Map([['initials', initials]]) });

    expect(applyOperator({ strategy: 'custom', parameters: { name: 'initials' } }, 'John Smith', SPAN, ctx))
      .toBe('PERSON:JS');
  });

  it('reports unknown and failing custom operators as ConfigError', () => {
    const boom = () => {
      throw new Error('nope');
    };
    const ctx = context({ customOperators: new Map([['boom', boom]]) });

    expect(() => applyOperator({ strategy: 'custom', parameters: { name: 'missing' } }, 'x', SPAN, ctx))
      .toThrow('Unknown custom operator "missing"');
    expect(() => applyOperator({ strategy: 'custom', parameters: { name: 'boom' } }, 'x', SPAN, ctx))
      .toThrow('Custom operator "boom" failed: nope');
  });
});

/**
 * Tests for type tokens and the response type negotiator.
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ResponseConversionError } from '../../core/errors.js';
import {
  defineType,
  describeDeclaredType,
  instanceOf,
  multipleInstancesOf,
  optionalInstanceOf,
  returns,
  returnsMany,
  returnsOptional,
  sameDeclaredType,
} from '../response-types.js';
import { Text } from './fixtures/types.js';

const Book = defineType('Book', z.object({ isbn: z.string(), title: z.string() }));

describe('defineType', () => {
  it('returns the parsed value on success', () => {
    expect(Book.check({ isbn: '0-000', title: 'Placeholder', extra: 1 })).toEqual({
      ok: true,
      value: { isbn: '0-000', title: 'Placeholder' },
    });
  });

  it('reports issues with their paths', () => {
    const result = Book.check({ isbn: '0-000', title: 7 });

    expect(result).toEqual({ ok: false, issues: ['title: Expected string, received number'] });
  });

  it('treats tokens with the same name as different types', () => {
    const Other = defineType('Text', z.string());

    expect(instanceOf(Text).matches(returns(Other))).toBe(false);
  });
});

describe('declared types', () => {
  it('compares by token and cardinality', () => {
    expect(sameDeclaredType(returns(Text), returns(Text))).toBe(true);
    expect(sameDeclaredType(returns(Text), returnsMany(Text))).toBe(false);
  });

  it('describes each cardinality', () => {
    expect(describeDeclaredType(returns(Book))).toBe('Book');
    expect(describeDeclaredType(returnsOptional(Book))).toBe('Book?');
    expect(describeDeclaredType(returnsMany(Book))).toBe('Book[]');
  });
});

describe('instanceOf', () => {
  const type = instanceOf(Book);

  it('matches single declarations only', () => {
    expect(type.matches(returns(Book))).toBe(true);
    expect(type.matches(returnsOptional(Book))).toBe(false);
    expect(type.matches(returnsMany(Book))).toBe(false);
  });

  it('converts a valid value', () => {
    expect(type.convert({ isbn: '1', title: 'T' })).toEqual({ isbn: '1', title: 'T' });
  });

  it('throws ResponseConversionError for an invalid value', () => {
    expect(() => type.convert(null)).toThrow(ResponseConversionError);
    expect(() => type.convert(null)).toThrow('Cannot convert value to Book: Expected object, received null');
  });
});

describe('optionalInstanceOf', () => {
  const type = optionalInstanceOf(Book);

  it('matches single and optional declarations', () => {
    expect(type.description).toBe('Book?');
    expect(type.matches(returns(Book))).toBe(true);
    expect(type.matches(returnsOptional(Book))).toBe(true);
    expect(type.matches(returnsMany(Book))).toBe(false);
  });

  it('converts null and undefined to undefined', () => {
    expect(type.convert(null)).toBeUndefined();
    expect(type.convert(undefined)).toBeUndefined();
  });
});

describe('multipleInstancesOf', () => {
  const type = multipleInstancesOf(Text);

  it('matches multiple declarations only', () => {
    expect(type.description).toBe('Text[]');
    expect(type.matches(returnsMany(Text))).toBe(true);
    expect(type.matches(returns(Text))).toBe(false);
  });

  it('converts any iterable into an array', () => {
    function* titles(): Generator<string> {
      yield 'a';
      yield 'b';
    }
    expect(type.convert(titles())).toEqual(['a', 'b']);
  });

  it('rejects strings and non-iterables', () => {
    expect(() => type.convert('ab')).toThrow('Cannot convert value to Text[]: expected an array or iterable');
    expect(() => type.convert(3)).toThrow(ResponseConversionError);
  });

  it('rejects an invalid element', () => {
    expect(() => type.convert(['a', 1])).toThrow('Cannot convert value to Text: Expected string, received number');
  });
});

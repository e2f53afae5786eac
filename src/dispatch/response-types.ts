/**
 * Response type negotiation.
 *
 * Handlers declare what they return (`returns`, `returnsMany`,
 * `returnsOptional`) against a type token defined once at wiring time.
 * Queries state what they expect (`instanceOf`, `multipleInstancesOf`,
 * `optionalInstanceOf`). The registry only routes a query to handlers whose
 * declaration the expected response type `matches`, and the bus `convert`s
 * every raw result into the expected shape.
 */

import type { z } from 'zod';
import { ResponseConversionError } from '../core/errors.js';

// ---------------------------------------------------------------------------
// Type tokens
// ---------------------------------------------------------------------------

export type CheckResult<T> = { ok: true; value: T } | { ok: false; issues: string[] };

/**
 * Routing identity of a payload type. Tokens compare by reference: two
 * tokens with the same name are still different types.
 */
export interface TypeToken<T> {
  readonly name: string;
  readonly check: (value: unknown) => CheckResult<T>;
}

/**
 * Define a type token backed by a zod schema.
 *
 * @example
 * const Book = defineType('Book', z.object({ isbn: z.string(), title: z.string() }));
 */
export function defineType<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): TypeToken<T> {
  return {
    name,
    check: (value) => {
      const parsed = schema.safeParse(value);
      if (parsed.success) return { ok: true, value: parsed.data };
      return {
        ok: false,
        issues: parsed.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
        ),
      };
    },
  };
}

// ---------------------------------------------------------------------------
// Handler declarations
// ---------------------------------------------------------------------------

export type Cardinality = 'single' | 'optional' | 'multiple';

/** What a handler declares it returns. */
export interface DeclaredType {
  readonly token: TypeToken<unknown>;
  readonly cardinality: Cardinality;
}

export function returns<T>(token: TypeToken<T>): DeclaredType {
  return { token, cardinality: 'single' };
}

export function returnsOptional<T>(token: TypeToken<T>): DeclaredType {
  return { token, cardinality: 'optional' };
}

export function returnsMany<T>(token: TypeToken<T>): DeclaredType {
  return { token, cardinality: 'multiple' };
}

export function sameDeclaredType(a: DeclaredType, b: DeclaredType): boolean {
  return a.token === b.token && a.cardinality === b.cardinality;
}

export function describeDeclaredType(declared: DeclaredType): string {
  switch (declared.cardinality) {
    case 'single':
      return declared.token.name;
    case 'optional':
      return `${declared.token.name}?`;
    case 'multiple':
      return `${declared.token.name}[]`;
  }
}

// ---------------------------------------------------------------------------
// Expected response types
// ---------------------------------------------------------------------------

/**
 * The shape a query expects back. Pluggable: any object with these members
 * can be used as a query's response type.
 */
export interface ResponseType<R> {
  readonly description: string;
  matches(declared: DeclaredType): boolean;
  convert(raw: unknown): R;
}

function convertOne<T>(token: TypeToken<T>, raw: unknown, expected: string): T {
  const result = token.check(raw);
  if (!result.ok) {
    throw new ResponseConversionError(expected, result.issues);
  }
  return result.value;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === 'object' && value !== null && Symbol.iterator in value;
}

class InstanceResponseType<T> implements ResponseType<T> {
  readonly description: string;

  constructor(private readonly token: TypeToken<T>) {
    this.description = token.name;
  }

  matches(declared: DeclaredType): boolean {
    return declared.token === this.token && declared.cardinality === 'single';
  }

  convert(raw: unknown): T {
    return convertOne(this.token, raw, this.description);
  }
}

class OptionalInstanceResponseType<T> implements ResponseType<T | undefined> {
  readonly description: string;

  constructor(private readonly token: TypeToken<T>) {
    this.description = `${token.name}?`;
  }

  matches(declared: DeclaredType): boolean {
    return declared.token === this.token && declared.cardinality !== 'multiple';
  }

  convert(raw: unknown): T | undefined {
    if (raw === null || raw === undefined) return undefined;
    return convertOne(this.token, raw, this.description);
  }
}

class MultipleInstancesResponseType<T> implements ResponseType<T[]> {
  readonly description: string;

  constructor(private readonly token: TypeToken<T>) {
    this.description = `${token.name}[]`;
  }

  matches(declared: DeclaredType): boolean {
    return declared.token === this.token && declared.cardinality === 'multiple';
  }

  convert(raw: unknown): T[] {
    if (!isIterable(raw) || typeof raw === 'string') {
      throw new ResponseConversionError(this.description, ['expected an array or iterable']);
    }
    return Array.from(raw, (item) => convertOne(this.token, item, this.token.name));
  }
}

/** Expect exactly one instance of the token's type. */
export function instanceOf<T>(token: TypeToken<T>): ResponseType<T> {
  return new InstanceResponseType(token);
}

/** Expect one instance or nothing; null and undefined convert to undefined. */
export function optionalInstanceOf<T>(token: TypeToken<T>): ResponseType<T | undefined> {
  return new OptionalInstanceResponseType(token);
}

/** Expect a list of the token's type; any non-string iterable converts to an array. */
export function multipleInstancesOf<T>(token: TypeToken<T>): ResponseType<T[]> {
  return new MultipleInstancesResponseType(token);
}

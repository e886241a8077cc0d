/**
 * Unit tests for the error taxonomy.
 * Tests construction, _tag values and matching on the unions.
 */
import { describe, expect, it } from '@effect/vitest'
import { Effect, Either, Schema } from 'effect'
import {
  ByteQuantity,
  ConfigurationError,
  ConfigurationErrorKind,
  type ConstructionError,
  DivisionByZeroError,
  OverflowError,
  ParseError,
  type QuantityError,
  TypeMismatchError,
} from '../src/index.js'

const describeError = (error: QuantityError): string => {
  switch (error._tag) {
    case 'ConfigurationError':
      return `config:${error.kind}`
    case 'ParseError':
      return `parse:${error.fragment}`
    case 'OverflowError':
      return 'overflow'
    case 'TypeMismatchError':
      return `mismatch:${error.operation}`
    case 'DivisionByZeroError':
      return 'zero'
  }
}

describe('ConfigurationError', () => {
  it('constructs with correct _tag', () => {
    const error = new ConfigurationError({ kind: 'unit', value: 'XB', message: 'Unknown unit: "XB"' })
    expect(error._tag).toBe('ConfigurationError')
    expect(error.value).toBe('XB')
    expect(error).toBeInstanceOf(Error)
  })

  it('validates kind with schema', () => {
    expect(Either.isRight(Schema.decodeUnknownEither(ConfigurationErrorKind)('ambiguous-unit'))).toBe(true)
    expect(Either.isLeft(Schema.decodeUnknownEither(ConfigurationErrorKind)('size'))).toBe(true)
  })
})

describe('error unions', () => {
  it('constructs every tag', () => {
    expect(new ParseError({ input: 'x', fragment: 'x', message: 'wrong value: <x>' })._tag).toBe('ParseError')
    expect(new OverflowError({ input: '1e400', message: '<1e400> is too big!' })._tag).toBe('OverflowError')
    expect(new TypeMismatchError({ operation: '+', left: '1', right: '2', message: 'no' })._tag).toBe(
      'TypeMismatchError',
    )
    expect(new DivisionByZeroError({ operation: '/', message: '1 / 0: division by zero' })._tag).toBe(
      'DivisionByZeroError',
    )
  })

  it.effect('lets callers match on the failure kind', () =>
    Effect.gen(function* () {
      const ambiguous = yield* Effect.flip(ByteQuantity.make('1MiB', 'KiB'))
      const malformed = yield* Effect.flip(ByteQuantity.make('1.2.3'))
      const tooLarge = yield* Effect.flip(ByteQuantity.make('1e999'))
      expect(describeError(ambiguous)).toBe('config:ambiguous-unit')
      expect(describeError(malformed)).toBe('parse:1.2.3')
      expect(describeError(tooLarge)).toBe('overflow')
    }),
  )

  it.effect('can be caught by tag in an effect', () =>
    Effect.gen(function* () {
      const recovered = yield* Effect.catchTag(
        Effect.map<ByteQuantity, ConstructionError, never, string>(
          ByteQuantity.make('1e999'),
          (quantity) => quantity.toString(),
        ),
        'OverflowError',
        () => Effect.succeed('too large'),
      )
      expect(recovered).toBe('too large')
    }),
  )
})

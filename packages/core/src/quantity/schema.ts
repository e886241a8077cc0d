import { Either, ParseResult, Schema } from 'effect'
import { Binary, type Standard } from '../standard/Standard.js'
import { ByteQuantity, isByteQuantity } from './ByteQuantity.js'

/** A ByteQuantity instance */
export const ByteQuantityInstance = Schema.declare(isByteQuantity, {
  identifier: 'ByteQuantity',
  description: 'a byte quantity',
})

/**
 * Decodes text such as "1.5MiB" into a ByteQuantity of `standard`, and
 * encodes a quantity back to its formatted text.
 */
export const ByteQuantityFromString = (standard: Standard = Binary) =>
  Schema.transformOrFail(Schema.String, ByteQuantityInstance, {
    strict: true,
    decode: (text, _, ast) =>
      Either.match(ByteQuantity.make(text, undefined, standard), {
        onLeft: (error) => ParseResult.fail(new ParseResult.Type(ast, text, error.message)),
        onRight: (quantity) => ParseResult.succeed(quantity),
      }),
    encode: (quantity) => ParseResult.succeed(quantity.toString()),
  })

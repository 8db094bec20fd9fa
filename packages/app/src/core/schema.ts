import * as ParseResult from "@effect/schema/ParseResult"
import * as S from "@effect/schema/Schema"
import * as Either from "effect/Either"

import { parse } from "./parse.js"
import { serialize } from "./serialize.js"
import type { JsonValue } from "./value.js"
import { isJsonValue, jsonTags } from "./value.js"

// CHANGE: expose the parser and the tag set as @effect/schema schemas
// WHY: let boundary decoders reuse the value model instead of JSON.parse
// QUOTE(TZ): n/a
// REF: req-schema-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: decode(JsonValueFromString)(s) = Right(v) ⇔ parse(s) = Right(v)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: encoding a decoded value yields canonical text
// COMPLEXITY: O(n)

export const JsonTagSchema = S.Literal(...jsonTags)

export const JsonValueFromSelf: S.Schema<JsonValue> = S.declare(
  (input: unknown): input is JsonValue => isJsonValue(input),
  { identifier: "JsonValue" }
)

export const JsonValueFromString: S.Schema<JsonValue, string> = S.transformOrFail(
  S.String,
  JsonValueFromSelf,
  {
    strict: true,
    decode: (text, _, ast) => {
      const parsed = parse(text)
      return Either.isLeft(parsed)
        ? ParseResult.fail(new ParseResult.Type(ast, text, parsed.left.message))
        : ParseResult.succeed(parsed.right)
    },
    encode: (value) => ParseResult.succeed(serialize(value))
  }
)

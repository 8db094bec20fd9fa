import type { JsonValue } from "./value.js"

// CHANGE: render values as canonical single-line JSON text
// WHY: one text per value, with object keys in sorted order
// QUOTE(TZ): n/a
// REF: req-serialize-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: parse(serialize(v)) = Right(w) ∧ equals(v, w)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: U+2028 and U+2029 never appear unescaped in the output
// COMPLEXITY: O(n)

const simpleEscapes: Readonly<Record<string, string>> = {
  "\\": "\\\\",
  "\"": "\\\"",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
  "\u2028": "\\u2028",
  "\u2029": "\\u2029"
}

const hex4 = (code: number): string => code.toString(16).padStart(4, "0")

const escapeChar = (char: string): string => simpleEscapes[char] ?? `\\u${hex4(char.charCodeAt(0))}`

const needsEscape = /["\\\u0000-\u001f\u2028\u2029]/gu

/**
 * Quote and escape a string as a JSON string literal.
 *
 * @pure true
 * @invariant control characters below 0x20 are always escaped
 * @complexity O(n)
 */
export const escapeString = (value: string): string => `"${value.replaceAll(needsEscape, escapeChar)}"`

const formatNumber = (value: number): string => Number.isFinite(value) ? String(value) : "null"

/**
 * Append the canonical text of a value to a buffer of chunks.
 *
 * @param value - Value to render.
 * @param out - Chunk buffer; joined by the caller.
 *
 * @pure false
 * @effect pushes to out
 * @complexity O(n)
 */
export const appendJson = (value: JsonValue, out: Array<string>): void => {
  switch (value._tag) {
    case "Null": {
      out.push("null")
      return
    }
    case "Integer": {
      out.push(value.value.toString())
      return
    }
    case "Number": {
      out.push(formatNumber(value.value))
      return
    }
    case "Bool": {
      out.push(value.value ? "true" : "false")
      return
    }
    case "String": {
      out.push(escapeString(value.value))
      return
    }
    case "Array": {
      out.push("[")
      value.items.forEach((item, index) => {
        if (index > 0) {
          out.push(", ")
        }
        appendJson(item, out)
      })
      out.push("]")
      return
    }
    case "Object": {
      out.push("{")
      let first = true
      for (const [key, child] of value.fields) {
        if (!first) {
          out.push(", ")
        }
        out.push(escapeString(key), ": ")
        appendJson(child, out)
        first = false
      }
      out.push("}")
      return
    }
  }
}

export const serialize = (value: JsonValue): string => {
  const out: Array<string> = []
  appendJson(value, out)
  return out.join("")
}

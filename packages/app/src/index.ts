export * from "./core/access.js"
export * from "./core/compare.js"
export * from "./core/convert.js"
export type { MutationError, ParseError, ParseErrorReason, ShapeError, ShapeErrorReason } from "./core/errors.js"
export * from "./core/mutate.js"
export * from "./core/parse.js"
export * from "./core/schema.js"
export * from "./core/serialize.js"
export * from "./core/shape.js"
export * from "./core/value.js"

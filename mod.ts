export type { CodePointInfo } from "./src/core/codepoint.ts";
export {
  codePointBefore,
  codePointLength,
  iterateCodePoints,
  iterateCodePointsReverse,
} from "./src/core/codepoint.ts";
export type { GraphemeErrorCode } from "./src/core/error.ts";
export { GraphemeError } from "./src/core/error.ts";
export type { NormalizedInput } from "./src/core/input.ts";
export { normalizeInput } from "./src/core/input.ts";
export type {
  AlgorithmInfo,
  Provenance,
  SegmentIterable,
  Span,
  TextInput,
} from "./src/core/types.ts";
export { IMPLEMENTATION_ID, LIBRARY_VERSION } from "./src/core/version.ts";
export * from "./src/segment/mod.ts";
export * from "./src/unicode/mod.ts";

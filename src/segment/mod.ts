export type { LocalBoundaryScan } from "./boundary.ts";
export {
  BoundaryContext,
  LocalBoundary,
  firstBoundary,
  isBoundary,
  lastLocalBoundary,
  localBoundary,
  stepContext,
} from "./boundary.ts";
export {
  GraphemeIndices,
  GraphemeRevIndices,
  GraphemeRevSlices,
  GraphemeSlices,
  countGraphemes,
  graphemeIndices,
  graphemeRevIndices,
  graphemes,
  graphemesReverse,
  segmentGraphemes,
} from "./grapheme.ts";

import { iterateCodePoints, iterateCodePointsReverse } from "../core/codepoint.ts";
import {
  PropertyClass,
  getPropertyClass,
  isControlClass,
  isGcbExtendClass,
  isHangulClass,
  isIncbExtendClass,
} from "../unicode/egc-props.ts";

/**
 * Outcome of a boundary test that only sees the two adjacent classes.
 */
export enum LocalBoundary {
  Boundary = 0,
  NoBoundary = 1,
  /** The pair alone cannot decide; the scan context is required. */
  NeedsContext = 2,
}

/**
 * Multi-character rule still open after the last processed code point.
 *
 * - `Start`: at a boundary, no rule open.
 * - `Indic` / `IndicLinked`: inside a conjunct candidate (GB9c), before / after a linker.
 * - `Emoji` / `EmojiJoined`: inside an emoji sequence (GB11), before / after the ZWJ.
 * - `RegionalIndicatorOpen`: odd number of consecutive regional indicators (GB12/GB13).
 */
export enum BoundaryContext {
  Start = 0,
  Indic = 1,
  IndicLinked = 2,
  Emoji = 3,
  EmojiJoined = 4,
  RegionalIndicatorOpen = 5,
}

/**
 * Result of a context-free backward scan.
 * Units: UTF-16 code units.
 */
export interface LocalBoundaryScan {
  offset: number;
  /** A context-dependent pair was crossed, so an earlier boundary may have been missed. */
  mayHaveSkipped: boolean;
}

/**
 * Decide the boundary between two adjacent classes without context.
 */
export function localBoundary(prev: PropertyClass, next: PropertyClass): LocalBoundary {
  if (prev === PropertyClass.Default && next === PropertyClass.Default) {
    return LocalBoundary.Boundary;
  }
  // GB3
  if (prev === PropertyClass.CarriageReturn && next === PropertyClass.LineFeed) {
    return LocalBoundary.NoBoundary;
  }
  // GB4, GB5
  if (isControlClass(prev) || isControlClass(next)) return LocalBoundary.Boundary;
  // GB6, GB7, GB8
  if (isHangulClass(prev) && isHangulClass(next)) {
    const merge =
      (prev === PropertyClass.HangulL && next !== PropertyClass.HangulT) ||
      ((prev === PropertyClass.HangulLV || prev === PropertyClass.HangulV) &&
        (next === PropertyClass.HangulV || next === PropertyClass.HangulT)) ||
      ((prev === PropertyClass.HangulLVT || prev === PropertyClass.HangulT) &&
        next === PropertyClass.HangulT);
    return merge ? LocalBoundary.NoBoundary : LocalBoundary.Boundary;
  }
  // GB9
  if (isGcbExtendClass(next) || next === PropertyClass.ZWJ) return LocalBoundary.NoBoundary;
  // GB9a, GB9b
  if (next === PropertyClass.SpacingMark || prev === PropertyClass.Prepend) {
    return LocalBoundary.NoBoundary;
  }
  // GB9c
  if (
    (isIncbExtendClass(prev) || prev === PropertyClass.IndicLinker) &&
    next === PropertyClass.IndicConsonant
  ) {
    return LocalBoundary.NeedsContext;
  }
  // GB11
  if (prev === PropertyClass.ZWJ && next === PropertyClass.ExtendedPictographic) {
    return LocalBoundary.NeedsContext;
  }
  // GB12, GB13
  if (prev === PropertyClass.RegionalIndicator && next === PropertyClass.RegionalIndicator) {
    return LocalBoundary.NeedsContext;
  }
  return LocalBoundary.Boundary;
}

/**
 * Advance the context past a code point of class `cls`.
 * Rules are tried in order: Indic conjunct, emoji sequence, regional indicator.
 */
export function stepContext(context: BoundaryContext, cls: PropertyClass): BoundaryContext {
  if (cls === PropertyClass.IndicConsonant) return BoundaryContext.Indic;
  if (context === BoundaryContext.Indic || context === BoundaryContext.IndicLinked) {
    if (cls === PropertyClass.IndicLinker) return BoundaryContext.IndicLinked;
    if (isIncbExtendClass(cls)) return context;
  }

  if (cls === PropertyClass.ExtendedPictographic) return BoundaryContext.Emoji;
  if (context === BoundaryContext.Emoji) {
    if (isGcbExtendClass(cls)) return BoundaryContext.Emoji;
    if (cls === PropertyClass.ZWJ) return BoundaryContext.EmojiJoined;
  }

  if (cls === PropertyClass.RegionalIndicator) {
    return context === BoundaryContext.RegionalIndicatorOpen
      ? BoundaryContext.Start
      : BoundaryContext.RegionalIndicatorOpen;
  }

  return BoundaryContext.Start;
}

/**
 * Whether a boundary lies between `prev` and `next`, where `context` includes `prev`.
 */
export function isBoundary(
  context: BoundaryContext,
  prev: PropertyClass,
  next: PropertyClass,
): boolean {
  const local = localBoundary(prev, next);
  if (local !== LocalBoundary.NeedsContext) return local === LocalBoundary.Boundary;
  return !(
    (context === BoundaryContext.IndicLinked && next === PropertyClass.IndicConsonant) ||
    (context === BoundaryContext.EmojiJoined && next === PropertyClass.ExtendedPictographic) ||
    (context === BoundaryContext.RegionalIndicatorOpen && next === PropertyClass.RegionalIndicator)
  );
}

/**
 * Offset of the first cluster boundary after `startCU` in `text[startCU, endCU)`, i.e. the end of
 * the first cluster. Returns `endCU` when the window holds at most one cluster.
 * Units: UTF-16 code units.
 */
export function firstBoundary(text: string, startCU = 0, endCU: number = text.length): number {
  let context = BoundaryContext.Start;
  let prev: PropertyClass | undefined;
  for (const { codePoint, indexCU } of iterateCodePoints(text, startCU, endCU)) {
    const cls = getPropertyClass(codePoint);
    if (prev !== undefined && isBoundary(context, prev, cls)) return indexCU;
    context = stepContext(context, cls);
    prev = cls;
  }
  return endCU;
}

/**
 * Offset just after the last boundary in `text[startCU, endCU)` that the adjacent pair alone
 * confirms, scanning backwards. Falls back to `startCU`.
 * Units: UTF-16 code units.
 */
export function lastLocalBoundary(
  text: string,
  startCU = 0,
  endCU: number = text.length,
): LocalBoundaryScan {
  let mayHaveSkipped = false;
  let next: PropertyClass | undefined;
  for (const { codePoint, indexCU, sizeCU } of iterateCodePointsReverse(text, startCU, endCU)) {
    const prev = getPropertyClass(codePoint);
    if (next !== undefined) {
      const local = localBoundary(prev, next);
      if (local === LocalBoundary.Boundary) {
        return { offset: indexCU + sizeCU, mayHaveSkipped };
      }
      if (local === LocalBoundary.NeedsContext) mayHaveSkipped = true;
    }
    next = prev;
  }
  return { offset: startCU, mayHaveSkipped };
}

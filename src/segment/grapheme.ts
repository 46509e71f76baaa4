import { GraphemeError } from "../core/error.ts";
import { normalizeInput } from "../core/input.ts";
import type { Provenance, SegmentIterable, Span, TextInput } from "../core/types.ts";
import { IMPLEMENTATION_ID } from "../core/version.ts";
import { UNICODE_VERSION } from "../unicode/version.ts";
import { firstBoundary, lastLocalBoundary } from "./boundary.ts";

const UAX29_SPEC = "https://unicode.org/reports/tr29/";

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Forward iterator over the end offsets of grapheme clusters.
 * Offsets strictly increase and the last one equals the end of the text.
 * Units: UTF-16 code units.
 */
export class GraphemeIndices implements IterableIterator<number> {
  readonly text: string;
  readonly end: number;
  private cursor: number;

  constructor(text: string, start = 0, end: number = text.length) {
    this.text = text;
    this.cursor = start;
    this.end = end;
  }

  /** Start of the part not yet consumed. */
  get offset(): number {
    return this.cursor;
  }

  next(): IteratorResult<number, undefined> {
    if (this.cursor === this.end) return DONE;
    this.cursor = firstBoundary(this.text, this.cursor, this.end);
    return { done: false, value: this.cursor };
  }

  [Symbol.iterator](): GraphemeIndices {
    return this;
  }

  /** Backward iterator over the clusters this iterator has not yet produced. */
  rev(): GraphemeRevIndices {
    return new GraphemeRevIndices(this.text, this.cursor, this.end);
  }

  clone(): GraphemeIndices {
    return new GraphemeIndices(this.text, this.cursor, this.end);
  }
}

/**
 * Backward iterator over the start offsets of grapheme clusters, from the end of the text.
 *
 * Each step first scans backwards for a boundary the adjacent pair alone confirms. When that
 * scan crossed a pair needing context, the run from the confirmed boundary is re-segmented
 * forwards once and every inner boundary goes on a stack, so later steps pop instead of
 * rescanning.
 * Units: UTF-16 code units.
 */
export class GraphemeRevIndices implements IterableIterator<number> {
  readonly text: string;
  readonly start: number;
  private cursor: number;
  private readonly deferred: number[];

  constructor(text: string, start = 0, end: number = text.length, deferred: number[] = []) {
    this.text = text;
    this.start = start;
    this.cursor = end;
    this.deferred = deferred;
  }

  /** End of the part not yet consumed. */
  get offset(): number {
    return this.cursor;
  }

  next(): IteratorResult<number, undefined> {
    if (this.cursor === this.start) return DONE;

    const popped = this.deferred.pop();
    if (popped !== undefined) {
      this.cursor = popped;
      return { done: false, value: popped };
    }

    const { offset: candidate, mayHaveSkipped } = lastLocalBoundary(
      this.text,
      this.start,
      this.cursor,
    );
    if (!mayHaveSkipped) {
      this.cursor = candidate;
      return { done: false, value: candidate };
    }

    const forward = new GraphemeIndices(this.text, candidate, this.cursor);
    let clusterStart = candidate;
    for (const clusterEnd of forward) {
      if (clusterEnd === this.cursor) {
        this.cursor = clusterStart;
        return { done: false, value: clusterStart };
      }
      this.deferred.push(clusterStart);
      clusterStart = clusterEnd;
    }
    throw new GraphemeError(
      "BOUNDARY_INVARIANT",
      "Forward rescan ended before reaching the backward cursor",
      { candidate, offset: this.cursor, deferred: this.deferred.length },
    );
  }

  [Symbol.iterator](): GraphemeRevIndices {
    return this;
  }

  /** Number of boundaries found by a rescan and not yet produced. */
  get pending(): number {
    return this.deferred.length;
  }

  clone(): GraphemeRevIndices {
    return new GraphemeRevIndices(this.text, this.start, this.cursor, this.deferred.slice());
  }
}

/**
 * Forward iterator over grapheme clusters as substrings.
 */
export class GraphemeSlices implements IterableIterator<string> {
  private readonly inner: GraphemeIndices;

  constructor(inner: GraphemeIndices) {
    this.inner = inner;
  }

  next(): IteratorResult<string, undefined> {
    const start = this.inner.offset;
    const step = this.inner.next();
    if (step.done) return DONE;
    return { done: false, value: this.inner.text.slice(start, step.value) };
  }

  [Symbol.iterator](): GraphemeSlices {
    return this;
  }

  rev(): GraphemeRevSlices {
    return new GraphemeRevSlices(this.inner.rev());
  }

  clone(): GraphemeSlices {
    return new GraphemeSlices(this.inner.clone());
  }
}

/**
 * Backward iterator over grapheme clusters as substrings, last cluster first.
 */
export class GraphemeRevSlices implements IterableIterator<string> {
  private readonly inner: GraphemeRevIndices;

  constructor(inner: GraphemeRevIndices) {
    this.inner = inner;
  }

  next(): IteratorResult<string, undefined> {
    const end = this.inner.offset;
    const step = this.inner.next();
    if (step.done) return DONE;
    return { done: false, value: this.inner.text.slice(step.value, end) };
  }

  [Symbol.iterator](): GraphemeRevSlices {
    return this;
  }

  clone(): GraphemeRevSlices {
    return new GraphemeRevSlices(this.inner.clone());
  }
}

/**
 * End offsets of the grapheme clusters of `input`, first to last.
 * Input may be UTF-8 bytes; offsets are UTF-16 code units.
 */
export function graphemeIndices(input: TextInput): GraphemeIndices {
  return new GraphemeIndices(normalizeInput(input).text);
}

/**
 * Start offsets of the grapheme clusters of `input`, last to first.
 * Input may be UTF-8 bytes; offsets are UTF-16 code units.
 */
export function graphemeRevIndices(input: TextInput): GraphemeRevIndices {
  return new GraphemeRevIndices(normalizeInput(input).text);
}

/**
 * Grapheme clusters of `input` as substrings, first to last.
 */
export function graphemes(input: TextInput): GraphemeSlices {
  return new GraphemeSlices(graphemeIndices(input));
}

/**
 * Grapheme clusters of `input` as substrings, last to first.
 */
export function graphemesReverse(input: TextInput): GraphemeRevSlices {
  return new GraphemeRevSlices(graphemeRevIndices(input));
}

/**
 * Number of grapheme clusters in `input`.
 */
export function countGraphemes(input: TextInput): number {
  let count = 0;
  for (const _ of graphemeIndices(input)) count += 1;
  return count;
}

/**
 * Segment grapheme clusters using UAX #29.
 * Input may be UTF-8 bytes; spans are in UTF-16 code units.
 */
export function segmentGraphemes(input: TextInput): SegmentIterable {
  const { text } = normalizeInput(input);
  const provenance: Provenance = {
    unicodeVersion: UNICODE_VERSION,
    algorithm: {
      name: "UAX29.Grapheme",
      spec: UAX29_SPEC,
      revisionOrDate: `Unicode ${UNICODE_VERSION}`,
      implementationId: IMPLEMENTATION_ID,
    },
    units: {
      text: "utf16-code-unit",
      grapheme: "uax29-grapheme",
    },
  };

  const generate = function* (): Iterable<Span> {
    let startCU = 0;
    for (const endCU of new GraphemeIndices(text)) {
      yield { startCU, endCU };
      startCU = endCU;
    }
  };

  return {
    provenance,
    [Symbol.iterator]: () => generate()[Symbol.iterator](),
  };
}

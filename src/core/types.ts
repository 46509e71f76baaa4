/**
 * TextInput defines an exported type contract.
 * Strings are used as-is; byte arrays are decoded as UTF-8.
 */
export type TextInput = string | Uint8Array;

/**
 * Span of one grapheme cluster.
 * Units: UTF-16 code units.
 */
export interface Span {
  startCU: number;
  endCU: number;
}

/**
 * AlgorithmInfo defines an exported structural contract.
 */
export interface AlgorithmInfo {
  name: string;
  spec: string;
  revisionOrDate: string;
  implementationId: string;
}

/**
 * Provenance defines an exported structural contract.
 */
export interface Provenance {
  unicodeVersion: string;
  algorithm: AlgorithmInfo;
  units: {
    text: "utf16-code-unit";
    grapheme: "uax29-grapheme";
  };
}

/**
 * SegmentIterable defines an exported structural contract.
 */
export interface SegmentIterable extends Iterable<Span> {
  provenance: Provenance;
}

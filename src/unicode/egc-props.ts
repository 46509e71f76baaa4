import { GraphemeError } from "../core/error.ts";
import egcData from "./data/egc-ranges.json" with { type: "json" };
import { type RangeTable, createRangeTable, lookupProperty } from "./lookup.ts";

/**
 * Combined Grapheme_Cluster_Break, Indic_Conjunct_Break and Extended_Pictographic class of a
 * code point. Only combinations that occur in the Unicode Character Database have a member.
 *
 * Order matters: control classes, Hangul classes, InCB=Extend (`ZWJ`, `IndicExtend`) and
 * GCB=Extend (`IndicExtend`, `IndicLinker`, `Extend`) are each contiguous.
 */
export enum PropertyClass {
  Default = 0,
  LineFeed = 1,
  CarriageReturn = 2,
  Control = 3,
  HangulL = 4,
  HangulV = 5,
  HangulT = 6,
  HangulLV = 7,
  HangulLVT = 8,
  SpacingMark = 9,
  Prepend = 10,
  IndicConsonant = 11,
  ZWJ = 12,
  IndicExtend = 13,
  IndicLinker = 14,
  Extend = 15,
  ExtendedPictographic = 16,
  RegionalIndicator = 17,
}

/**
 * PROPERTY_CLASS_NAMES is an exported constant used by public APIs.
 */
export const PROPERTY_CLASS_NAMES = [
  "Default",
  "LineFeed",
  "CarriageReturn",
  "Control",
  "HangulL",
  "HangulV",
  "HangulT",
  "HangulLV",
  "HangulLVT",
  "SpacingMark",
  "Prepend",
  "IndicConsonant",
  "ZWJ",
  "IndicExtend",
  "IndicLinker",
  "Extend",
  "ExtendedPictographic",
  "RegionalIndicator",
] as const;

/**
 * PropertyClassName defines an exported type contract.
 */
export type PropertyClassName = (typeof PROPERTY_CLASS_NAMES)[number];

/** LF, CR or Control. */
export function isControlClass(cls: PropertyClass): boolean {
  return cls >= PropertyClass.LineFeed && cls <= PropertyClass.Control;
}

/** L, V, T, LV or LVT. */
export function isHangulClass(cls: PropertyClass): boolean {
  return cls >= PropertyClass.HangulL && cls <= PropertyClass.HangulLVT;
}

/** Indic_Conjunct_Break=Extend. */
export function isIncbExtendClass(cls: PropertyClass): boolean {
  return cls >= PropertyClass.ZWJ && cls <= PropertyClass.IndicExtend;
}

/** Grapheme_Cluster_Break=Extend. */
export function isGcbExtendClass(cls: PropertyClass): boolean {
  return cls >= PropertyClass.IndicExtend && cls <= PropertyClass.Extend;
}

const HANGUL_SYLLABLE_FIRST = 0xac00;
const HANGUL_SYLLABLE_LAST = 0xd7a3;
const HANGUL_TRAILING_COUNT = 28;

function loadRangeTable(): RangeTable {
  const { classes, ranges } = egcData;
  if (
    classes.length !== PROPERTY_CLASS_NAMES.length ||
    classes.some((name, index) => name !== PROPERTY_CLASS_NAMES[index])
  ) {
    throw new GraphemeError("RANGE_TABLE_INVALID", "Range table classes do not match", {
      classes,
    });
  }
  const table = createRangeTable(ranges, PROPERTY_CLASS_NAMES.length);
  for (let base = 0; base < table.length; base += 3) {
    const start = table[base] ?? 0;
    const end = table[base + 1] ?? 0;
    if (start <= HANGUL_SYLLABLE_LAST && end >= HANGUL_SYLLABLE_FIRST) {
      throw new GraphemeError(
        "RANGE_TABLE_INVALID",
        "Range table must not cover precomposed Hangul syllables",
        { start, end },
      );
    }
  }
  return table;
}

const EGC_RANGES: RangeTable = loadRangeTable();

/**
 * Unicode Character Database version of the range table.
 */
export const EGC_DATA_UNICODE_VERSION: string = egcData.unicodeVersion;

/**
 * Segmentation class for a Unicode scalar value.
 * Units: Unicode scalar values.
 */
export function getPropertyClass(codePoint: number): PropertyClass {
  if ((codePoint >= 0x20 && codePoint < 0x7f) || (codePoint >= 0x3300 && codePoint < 0xa000)) {
    return PropertyClass.Default;
  }
  if (codePoint >= HANGUL_SYLLABLE_FIRST && codePoint <= HANGUL_SYLLABLE_LAST) {
    return (codePoint - HANGUL_SYLLABLE_FIRST) % HANGUL_TRAILING_COUNT === 0
      ? PropertyClass.HangulLV
      : PropertyClass.HangulLVT;
  }
  return lookupProperty(EGC_RANGES, codePoint);
}

/**
 * Name of the segmentation class for a Unicode scalar value.
 * Units: Unicode scalar values.
 */
export function getPropertyClassName(codePoint: number): PropertyClassName {
  return PROPERTY_CLASS_NAMES[getPropertyClass(codePoint)] ?? "Default";
}

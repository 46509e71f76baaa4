/**
 * Code point and its UTF-16 index metadata.
 * Units: Unicode scalar values.
 * Units: UTF-16 code units.
 */
export interface CodePointInfo {
  codePoint: number;
  indexCU: number;
  sizeCU: number;
}

/**
 * Iterate code points of `text[startCU, endCU)` with UTF-16 code unit offsets.
 * Lone surrogates are yielded as single code points.
 * Units: UTF-16 code units.
 */
export function* iterateCodePoints(
  text: string,
  startCU = 0,
  endCU: number = text.length,
): Iterable<CodePointInfo> {
  for (let codeUnitIndex = startCU; codeUnitIndex < endCU; ) {
    const codePoint = text.codePointAt(codeUnitIndex) ?? 0;
    const sizeCU = codePointLength(codePoint);
    yield { codePoint, indexCU: codeUnitIndex, sizeCU };
    codeUnitIndex += sizeCU;
  }
}

/**
 * Iterate code points of `text[startCU, endCU)` from the end towards the start.
 * Surrogate pairs are recognised exactly as {@link iterateCodePoints} recognises them.
 * Units: UTF-16 code units.
 */
export function* iterateCodePointsReverse(
  text: string,
  startCU = 0,
  endCU: number = text.length,
): Iterable<CodePointInfo> {
  for (let codeUnitIndex = endCU; codeUnitIndex > startCU; ) {
    const info = codePointBefore(text, codeUnitIndex, startCU);
    yield info;
    codeUnitIndex = info.indexCU;
  }
}

/**
 * The code point ending at `indexCU`, not reaching below `startCU`.
 * Units: UTF-16 code units.
 */
export function codePointBefore(text: string, indexCU: number, startCU = 0): CodePointInfo {
  if (indexCU - 2 >= startCU) {
    const pair = text.codePointAt(indexCU - 2) ?? 0;
    if (pair > 0xffff) return { codePoint: pair, indexCU: indexCU - 2, sizeCU: 2 };
  }
  return { codePoint: text.charCodeAt(indexCU - 1), indexCU: indexCU - 1, sizeCU: 1 };
}

/**
 * Length of a Unicode scalar value in UTF-16 code units.
 * Units: Unicode scalar values.
 */
export function codePointLength(codePoint: number): number {
  return codePoint > 0xffff ? 2 : 1;
}

import { GraphemeError } from "../core/error.ts";

/**
 * Flat `[start, end, value]` triples, sorted by start, inclusive bounds.
 */
export type RangeTable = Int32Array;

/**
 * RangeTableSource defines an exported type contract.
 */
export type RangeTableSource = readonly (readonly number[])[];

const MAX_CODE_POINT = 0x10ffff;

/**
 * Build a range table from `[start, end, value]` rows, rejecting rows that are malformed,
 * out of order, or overlapping.
 * Units: Unicode scalar values.
 */
export function createRangeTable(rows: RangeTableSource, valueCount: number): RangeTable {
  const table = new Int32Array(rows.length * 3);
  let previousEnd = -1;
  rows.forEach((row, index) => {
    const [start, end, value] = row;
    if (
      row.length !== 3 ||
      start === undefined ||
      end === undefined ||
      value === undefined ||
      !Number.isInteger(start) ||
      !Number.isInteger(end) ||
      !Number.isInteger(value)
    ) {
      throw new GraphemeError("RANGE_TABLE_INVALID", "Range row must be three integers", {
        index,
      });
    }
    if (start <= previousEnd || end < start || end > MAX_CODE_POINT) {
      throw new GraphemeError("RANGE_TABLE_INVALID", "Ranges must be sorted and disjoint", {
        index,
        start,
        end,
        previousEnd,
      });
    }
    if (value < 0 || value >= valueCount) {
      throw new GraphemeError("RANGE_TABLE_INVALID", "Range value out of bounds", {
        index,
        value,
      });
    }
    table[index * 3] = start;
    table[index * 3 + 1] = end;
    table[index * 3 + 2] = value;
    previousEnd = end;
  });
  return table;
}

/**
 * Lookup a property value for a Unicode scalar value in a range table.
 * Returns 0 when no range contains the code point.
 * Units: Unicode scalar values.
 */
export function lookupProperty(table: RangeTable, codePoint: number): number {
  let lo = 0;
  let hi = table.length / 3 - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const base = mid * 3;
    const start = table[base] ?? 0;
    const end = table[base + 1] ?? 0;
    if (codePoint < start) {
      hi = mid - 1;
    } else if (codePoint > end) {
      lo = mid + 1;
    } else {
      return table[base + 2] ?? 0;
    }
  }
  return 0;
}

export type { PropertyClassName } from "./egc-props.ts";
export {
  PROPERTY_CLASS_NAMES,
  PropertyClass,
  getPropertyClass,
  getPropertyClassName,
  isControlClass,
  isGcbExtendClass,
  isHangulClass,
  isIncbExtendClass,
} from "./egc-props.ts";
export type { RangeTable, RangeTableSource } from "./lookup.ts";
export { createRangeTable, lookupProperty } from "./lookup.ts";
export { UNICODE_VERSION } from "./version.ts";

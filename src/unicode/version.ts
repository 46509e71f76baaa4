import { EGC_DATA_UNICODE_VERSION } from "./egc-props.ts";

/**
 * UNICODE_VERSION is an exported constant used by public APIs.
 */
export const UNICODE_VERSION: string = EGC_DATA_UNICODE_VERSION;

// src/lib/types/base.ts

/** ISO-8601 timestamp as returned by the API or `Date#toISOString`. */
export type ISODateTime = string;

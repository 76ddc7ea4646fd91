/**
 * Core pipeline stages - pure, synchronous building blocks of every leg
 *
 * - extractor: locate the `key = "..."` payload inside a controller page
 * - decoder: positional field decoding with unit scaling
 * - statistics: single-pass min/max/avg/delta with partitions
 * - sanitizer: replace implausible samples before aggregation
 */

export * from './extractor';
export * from './decoder';
export * from './statistics';
export * from './sanitizer';

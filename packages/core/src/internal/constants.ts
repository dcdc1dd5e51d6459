/**
 * Core constants for stratum data structures
 */

// Hash-trie parameters (32-way branching)
export const BITS = 5;
export const BRANCH_FACTOR = 1 << BITS; // 32
export const MASK = BRANCH_FACTOR - 1;  // 31

// Hashes are unsigned 32-bit integers; the last level consumes the top 2 bits
export const HASH_BITS = 32;
export const MAX_DEPTH = Math.ceil(HASH_BITS / BITS); // 7

// OrderIndex compaction threshold (compact when holes > 50%)
export const ORDER_COMPACT_RATIO = 0.5;
export const ORDER_COMPACT_MIN = 32;

// toString() truncation, not counting delimiters
export const FORMAT_MAX_LENGTH = 60;

/**
 * livemark - Hash Utilities
 *
 * Deterministic content hashing used to decide whether a query, an
 * expression value or a mounted node changed between two passes.
 */

/**
 * Generate a deterministic hash from any JSON-like value.
 * Object keys are sorted first, so `{a, b}` and `{b, a}` hash the same.
 */
export function createHash(data: unknown): string {
  return fnv1aHash(stableStringify(data));
}

/**
 * Serialize a value with sorted object keys.
 * `undefined` (which JSON drops) is written as a sentinel so it still hashes.
 */
export function stableStringify(data: unknown): string {
  return JSON.stringify(data, sortReplacer) ?? 'undefined';
}

/**
 * FNV-1a hash, 32 bit, hex encoded
 */
function fnv1aHash(str: string): string {
  let hash = 2166136261; // FNV offset basis
  for (let i = 0; i < str.length; i++) {
    hash ^= str.charCodeAt(i);
    // FNV prime multiplication using bit operations
    hash += (hash << 1) + (hash << 4) + (hash << 7) + (hash << 8) + (hash << 24);
  }
  return (hash >>> 0).toString(16).padStart(8, '0');
}

function sortReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const sorted: Record<string, unknown> = {};
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [key, entry] of entries) {
    sorted[key] = entry;
  }
  return sorted;
}

/**
 * Compare two hashes for equality. `null` only equals `null`.
 */
export function hashEquals(a: string | null, b: string | null): boolean {
  if (a === null || b === null) return a === b;
  if (a.length !== b.length) return false;
  let result = 0;
  for (let i = 0; i < a.length; i++) {
    result |= a.charCodeAt(i) ^ b.charCodeAt(i);
  }
  return result === 0;
}

/**
 * Combine hashes into one. Order is significant: the same values at
 * different leaves must not collapse into the same combined hash.
 */
export function combineHashes(hashes: readonly string[]): string {
  return createHash(hashes.join(':'));
}

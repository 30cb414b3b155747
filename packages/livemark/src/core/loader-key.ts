/**
 * Canonical keys for one-shot loads: `<kind>:<pubkey>:<identifier>`.
 * Two requests with the same key refer to the same logical record.
 */

export type LoaderKey = string;

export interface LoaderAddress {
  kind: number;
  pubkey: string;
  /** `d` tag of an addressable record; empty for replaceable records */
  identifier?: string;
}

export function loaderKey(address: LoaderAddress): LoaderKey {
  return `${address.kind}:${address.pubkey}:${address.identifier ?? ''}`;
}

export function parseLoaderKey(key: LoaderKey): LoaderAddress | null {
  const first = key.indexOf(':');
  const second = key.indexOf(':', first + 1);
  if (first <= 0 || second < 0) return null;

  const kind = Number(key.slice(0, first));
  const pubkey = key.slice(first + 1, second);
  if (!Number.isInteger(kind) || kind < 0 || pubkey.length === 0) return null;

  return { kind, pubkey, identifier: key.slice(second + 1) };
}

/**
 * Key a fetched record belongs to. Addressable records carry their
 * identifier in a `d` tag.
 */
export function recordLoaderKey(record: {
  kind: number;
  pubkey: string;
  tags: readonly (readonly string[])[];
}): LoaderKey {
  const d = record.tags.find((tag) => tag[0] === 'd');
  return loaderKey({ kind: record.kind, pubkey: record.pubkey, identifier: d?.[1] ?? '' });
}

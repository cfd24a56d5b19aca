/** Lowercase hex without separators. */
export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

/** Normalize a spaced hex listing such as "81 A3 66". */
export function hex(listing: string): string {
  return listing.replace(/\s+/g, '').toLowerCase();
}

import type { HashRecord } from "../types/manifest.js";

const LINE = /^([0-9a-fA-F]{64})\s+\*?(.+)$/;

/**
 * Parse a sha256sum-style list: `<hex>  <name>` or `<hex> *<name>` per line.
 * Lines that do not fit are skipped.
 */
export function parseHashList(text: string): HashRecord {
  const record: HashRecord = new Map();
  for (const line of text.split(/\r?\n/)) {
    const m = LINE.exec(line.trim());
    if (!m) continue;
    record.set(m[2], m[1].toLowerCase());
  }
  return record;
}

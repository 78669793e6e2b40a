import fs from "node:fs";
import path from "node:path";

export const KEYRING_FILE = "trusted_pubkeys_keyring.gpg";

/**
 * ASCII-armored public keys (`*.asc`) in a directory, sorted by name.
 * A missing directory yields an empty list.
 */
export function listTrustedKeys(dir: string): string[] {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((e) => e.isFile() && e.name.endsWith(".asc"))
    .map((e) => path.join(dir, e.name))
    .sort();
}

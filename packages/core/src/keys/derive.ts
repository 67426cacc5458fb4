import { hkdf } from "@noble/hashes/hkdf.js";
import { sha256 } from "@noble/hashes/sha2.js";
import { bytesToHex } from "@noble/hashes/utils.js";

export type KeyPurpose = "data" | "metadata";

export const MASTER_KEY_LENGTH = 32;

/**
 * Derives a purpose-specific 32-byte key via HKDF-SHA256.
 * salt = "coldbox", info = "purpose:{purpose}".
 */
export function derivePurposeKey(
  masterKey: Uint8Array,
  purpose: KeyPurpose,
): Uint8Array {
  const salt = new TextEncoder().encode("coldbox");
  const info = new TextEncoder().encode(`purpose:${purpose}`);
  return hkdf(sha256, masterKey, salt, info, 32);
}

/** Public identifier of a master key: first 8 bytes of its SHA-256, hex. */
export function keyIdOf(masterKey: Uint8Array): string {
  return bytesToHex(sha256(masterKey)).slice(0, 16);
}

/** Hex-encoded derived key, usable as an OpenPGP password. */
export function purposePassword(
  masterKey: Uint8Array,
  purpose: KeyPurpose,
): string {
  return bytesToHex(derivePurposeKey(masterKey, purpose));
}

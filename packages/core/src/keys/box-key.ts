/**
 * Box key identity. Each box owns one random master key, written once at box
 * creation and never rotated. Codec keys are derived from it per purpose.
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { bytesToHex, hexToBytes, randomBytes } from "@noble/hashes/utils.js";
import { z } from "zod";
import { KeyMismatchError } from "../errors/catalog.js";
import { MASTER_KEY_LENGTH, keyIdOf } from "./derive.js";

export interface BoxKey {
  id: string;
  masterKey: Uint8Array;
}

const KeyFileSchema = z.object({
  version: z.literal(1),
  id: z.string(),
  masterKey: z.string().regex(/^[0-9a-f]{64}$/),
});

/** Generates a fresh master key and writes it; refuses to overwrite a file. */
export async function createBoxKey(keyPath: string): Promise<BoxKey> {
  const masterKey = randomBytes(MASTER_KEY_LENGTH);
  const id = keyIdOf(masterKey);

  await mkdir(dirname(keyPath), { recursive: true, mode: 0o700 });
  const data = { version: 1, id, masterKey: bytesToHex(masterKey) };
  await writeFile(keyPath, JSON.stringify(data, null, 2) + "\n", {
    mode: 0o600,
    flag: "wx",
  });

  return { id, masterKey };
}

/** Loads a key file and checks it matches the identity the box expects. */
export async function loadBoxKey(
  keyPath: string,
  expectedId?: string,
): Promise<BoxKey> {
  const raw = await readFile(keyPath, "utf-8");
  const data = KeyFileSchema.parse(JSON.parse(raw));
  const masterKey = hexToBytes(data.masterKey);
  const id = keyIdOf(masterKey);

  if (id !== data.id || (expectedId !== undefined && id !== expectedId)) {
    throw new KeyMismatchError(keyPath, expectedId ?? data.id, id);
  }

  return { id, masterKey };
}

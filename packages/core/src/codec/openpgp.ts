import * as openpgp from "openpgp";
import { sha256 } from "@noble/hashes/sha2.js";
import { bytesToHex } from "@noble/hashes/utils.js";
import { z } from "zod";
import { DecodeError } from "../errors/catalog.js";
import { purposePassword, type KeyPurpose } from "../keys/derive.js";
import type { BoxKey } from "../keys/box-key.js";
import type { Codec, SourceMetadata } from "./interface.js";

const METADATA_VERSION = 1;

const MetadataSchema = z.object({
  version: z.literal(METADATA_VERSION),
  name: z.string().min(1),
  comment: z.string(),
  plaintextSize: z.number().int().nonnegative(),
  fingerprint: z.string().regex(/^[0-9a-f]{64}$/),
  createdAt: z.iso.datetime(),
});

export function fingerprintOf(bytes: Uint8Array): string {
  return bytesToHex(sha256(bytes));
}

/** OpenPGP password-based encryption, same binary format for both blobs. */
export async function encryptWithPassword(
  plaintext: Uint8Array,
  password: string,
): Promise<Uint8Array> {
  const message = await openpgp.createMessage({ binary: plaintext });
  return openpgp.encrypt({
    message,
    passwords: [password],
    format: "binary",
  });
}

/**
 * @throws if the password is wrong or the data is corrupted
 */
export async function decryptWithPassword(
  encrypted: Uint8Array,
  password: string,
): Promise<Uint8Array> {
  const message = await openpgp.readMessage({ binaryMessage: encrypted });
  const { data } = await openpgp.decrypt({
    message,
    passwords: [password],
    format: "binary",
  });
  return data;
}

async function decryptFor(
  purpose: KeyPurpose,
  blob: Uint8Array,
  key: BoxKey,
): Promise<Uint8Array> {
  try {
    return await decryptWithPassword(blob, purposePassword(key.masterKey, purpose));
  } catch (err) {
    throw new DecodeError(
      `Cannot decrypt ${purpose} blob with key ${key.id}`,
      { purpose, keyId: key.id },
      err,
    );
  }
}

async function readMetadata(
  metadata: Uint8Array,
  key: BoxKey,
): Promise<SourceMetadata> {
  const json = new TextDecoder().decode(await decryptFor("metadata", metadata, key));
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new DecodeError("Metadata is not valid JSON", { keyId: key.id }, err);
  }
  const result = MetadataSchema.safeParse(parsed);
  if (!result.success) {
    throw new DecodeError("Metadata does not match the expected shape", {
      keyId: key.id,
      issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  const { version: _version, ...info } = result.data;
  return info;
}

export function createOpenPgpCodec(): Codec {
  return {
    async encode(input, key) {
      const info: SourceMetadata = {
        name: input.name,
        comment: input.comment,
        plaintextSize: input.plaintext.byteLength,
        fingerprint: fingerprintOf(input.plaintext),
        createdAt: input.createdAt ?? new Date().toISOString(),
      };
      const metadataJson = new TextEncoder().encode(
        JSON.stringify({ version: METADATA_VERSION, ...info }),
      );

      const data = await encryptWithPassword(
        input.plaintext,
        purposePassword(key.masterKey, "data"),
      );
      const metadata = await encryptWithPassword(
        metadataJson,
        purposePassword(key.masterKey, "metadata"),
      );
      return { data, metadata, info };
    },

    async decode(data, metadata, key) {
      const info = await readMetadata(metadata, key);
      const plaintext = await decryptFor("data", data, key);

      if (plaintext.byteLength !== info.plaintextSize) {
        throw new DecodeError(`Size mismatch for ${info.name}`, {
          source: info.name,
          expected: info.plaintextSize,
          actual: plaintext.byteLength,
        });
      }
      const fingerprint = fingerprintOf(plaintext);
      if (fingerprint !== info.fingerprint) {
        throw new DecodeError(`Fingerprint mismatch for ${info.name}`, {
          source: info.name,
          expected: info.fingerprint,
          actual: fingerprint,
        });
      }
      return { plaintext, info };
    },

    readMetadata,
  };
}

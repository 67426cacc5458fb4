import type { BoxKey } from "../keys/box-key.js";

/** What a metadata blob holds about its source. */
export interface SourceMetadata {
  name: string;
  comment: string;
  plaintextSize: number;
  /** sha256 of the plaintext, hex */
  fingerprint: string;
  createdAt: string;
}

export interface EncodeInput {
  name: string;
  comment: string;
  plaintext: Uint8Array;
  createdAt?: string;
}

export interface EncodedSource {
  data: Uint8Array;
  metadata: Uint8Array;
  info: SourceMetadata;
}

export interface DecodedSource {
  plaintext: Uint8Array;
  info: SourceMetadata;
}

/**
 * Encryption and framing at the backend boundary. Every failure to decode
 * (wrong key, corrupt blob, fingerprint or size mismatch) is a DecodeError.
 */
export interface Codec {
  encode(input: EncodeInput, key: BoxKey): Promise<EncodedSource>;
  decode(
    data: Uint8Array,
    metadata: Uint8Array,
    key: BoxKey,
  ): Promise<DecodedSource>;
  readMetadata(metadata: Uint8Array, key: BoxKey): Promise<SourceMetadata>;
}

export type {
  Codec,
  DecodedSource,
  EncodedSource,
  EncodeInput,
  SourceMetadata,
} from "./interface.js";
export {
  createOpenPgpCodec,
  decryptWithPassword,
  encryptWithPassword,
  fingerprintOf,
} from "./openpgp.js";
export {
  packPath,
  unpackTo,
  type Compression,
  type PackOptions,
  type UnpackOptions,
} from "./pack.js";

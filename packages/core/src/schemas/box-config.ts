import { z } from "zod";

export const BOX_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/;

export const ARCHIVE_STORAGE_CLASSES = ["GLACIER", "DEEP_ARCHIVE"] as const;

export const ObjectStoreStorageClass = z.enum([
  "STANDARD",
  "STANDARD_IA",
  "ONEZONE_IA",
  "INTELLIGENT_TIERING",
  "GLACIER_IR",
  ...ARCHIVE_STORAGE_CLASSES,
]);

export const RetrievalTier = z.enum(["Expedited", "Standard", "Bulk"]);

export const LocalBackendConfigSchema = z.object({
  kind: z.literal("local"),
  folderPath: z.string().min(1),
});

export const WebDavBackendConfigSchema = z.object({
  kind: z.literal("webdav"),
  url: z.url(),
  username: z.string().min(1),
  password: z.string().min(1),
});

export const ObjectStoreBackendConfigSchema = z.object({
  kind: z.literal("object-store"),
  bucket: z.string().min(3),
  prefix: z.string().default(""),
  region: z.string().optional(),
  profile: z.string().optional(),
  endpoint: z.url().optional(),
  storageClass: ObjectStoreStorageClass.default("DEEP_ARCHIVE"),
  tier: RetrievalTier.default("Bulk"),
  restoreDays: z.number().int().min(1).max(30).default(1),
});

export const BackendConfigSchema = z.discriminatedUnion("kind", [
  LocalBackendConfigSchema,
  WebDavBackendConfigSchema,
  ObjectStoreBackendConfigSchema,
]);

export const BoxConfigSchema = z.object({
  version: z.literal(1),
  name: z.string().regex(BOX_NAME_PATTERN),
  backend: BackendConfigSchema,
  key: z.object({
    id: z.string().regex(/^[0-9a-f]{16}$/),
    file: z.string().min(1).describe("Key file name inside the box directory"),
  }),
  createdAt: z.iso.datetime(),
});

export type LocalBackendConfig = z.infer<typeof LocalBackendConfigSchema>;
export type WebDavBackendConfig = z.infer<typeof WebDavBackendConfigSchema>;
export type ObjectStoreBackendConfig = z.infer<
  typeof ObjectStoreBackendConfigSchema
>;
export type BackendConfig = z.infer<typeof BackendConfigSchema>;
export type BackendConfigInput = z.input<typeof BackendConfigSchema>;
export type BoxConfig = z.infer<typeof BoxConfigSchema>;
export type RetrievalTierName = z.infer<typeof RetrievalTier>;
export type StorageClassName = z.infer<typeof ObjectStoreStorageClass>;

export function isArchiveStorageClass(storageClass: string): boolean {
  return ARCHIVE_STORAGE_CLASSES.some((archived) => archived === storageClass);
}

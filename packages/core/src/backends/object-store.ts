/**
 * S3-compatible object store backend.
 *
 * With an archive storage class (GLACIER, DEEP_ARCHIVE) data objects must be
 * restored before they can be fetched: startRetrieval issues RestoreObject
 * unless HeadObject already reports a restore, and pollRetrieval reads the
 * `x-amz-restore` header. Metadata objects always use STANDARD.
 */

import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  RestoreObjectCommand,
  S3Client,
  S3ServiceException,
  type ListObjectsV2CommandOutput,
  type S3ClientConfig,
} from "@aws-sdk/client-s3";
import {
  ColdboxError,
  FatalBackendError,
  NotFoundError,
  TransientBackendError,
} from "../errors/catalog.js";
import {
  RetrievalTier,
  isArchiveStorageClass,
  type ObjectStoreBackendConfig,
} from "../schemas/box-config.js";
import type {
  Backend,
  BackendOptions,
  ObjectEntry,
  ObjectHead,
  RestoreState,
} from "./interface.js";

export type ObjectStoreBackendOptions = Omit<ObjectStoreBackendConfig, "kind">;

const INVENTORY_HANDLE = "inventory";

const TRANSIENT_ERROR_NAMES = new Set([
  "SlowDown",
  "Throttling",
  "ThrottlingException",
  "TooManyRequestsException",
  "RequestTimeout",
  "RequestTimeTooSkewed",
  "InternalError",
  "ServiceUnavailable",
]);

const NOT_FOUND_ERROR_NAMES = new Set(["NotFound", "NoSuchKey"]);

function statusOf(err: S3ServiceException): number | undefined {
  return err.$metadata.httpStatusCode;
}

function isNotFound(err: unknown): boolean {
  return (
    err instanceof S3ServiceException &&
    (statusOf(err) === 404 || NOT_FOUND_ERROR_NAMES.has(err.name))
  );
}

function toBackendError(
  err: unknown,
  operation: string,
  key?: string,
): ColdboxError {
  if (err instanceof ColdboxError) return err;
  const message = `Object store ${operation} failed${key ? ` for ${key}` : ""}: ${
    err instanceof Error ? err.message : String(err)
  }`;
  const details = {
    backend: "object-store",
    operation,
    ...(key !== undefined && { key }),
  };

  if (err instanceof S3ServiceException) {
    const status = statusOf(err);
    const full = { ...details, name: err.name, status };
    if (
      TRANSIENT_ERROR_NAMES.has(err.name) ||
      status === 429 ||
      (status !== undefined && status >= 500)
    ) {
      return new TransientBackendError(message, full, err);
    }
    return new FatalBackendError(message, full, err);
  }

  // No response from the service: credentials problems are configuration,
  // everything else is the network.
  if (err instanceof Error && err.name === "CredentialsProviderError") {
    return new FatalBackendError(message, details, err);
  }
  return new TransientBackendError(message, details, err);
}

/** Maps a HeadObject `x-amz-restore` header on an archived object. */
export function parseRestoreHeader(header: string | undefined): RestoreState {
  if (header === undefined) return "required";
  if (header.includes('ongoing-request="true"')) return "in-progress";
  if (header.includes('ongoing-request="false"')) return "ready";
  return "required";
}

export function createObjectStoreBackend(
  options: ObjectStoreBackendOptions,
): Backend {
  const {
    bucket,
    prefix,
    storageClass,
    tier: defaultTier,
    restoreDays,
  } = options;
  const archive = isArchiveStorageClass(storageClass);

  const clientConfig: S3ClientConfig = {
    ...(options.region !== undefined && { region: options.region }),
    ...(options.profile !== undefined && { profile: options.profile }),
    ...(options.endpoint !== undefined && {
      endpoint: options.endpoint,
      forcePathStyle: true,
    }),
  };
  const client = new S3Client(clientConfig);

  function objectKey(key: string): string {
    if (key.length === 0 || key.includes("/")) {
      throw new FatalBackendError(`Invalid object key: ${JSON.stringify(key)}`, {
        backend: "object-store",
        key,
      });
    }
    return prefix + key;
  }

  async function head(key: string): Promise<ObjectHead | null> {
    const Key = objectKey(key);
    try {
      const res = await client.send(
        new HeadObjectCommand({ Bucket: bucket, Key }),
      );
      const objectClass = res.StorageClass ?? "STANDARD";
      return {
        size: res.ContentLength ?? 0,
        storageClass: objectClass,
        restore: isArchiveStorageClass(objectClass)
          ? parseRestoreHeader(res.Restore)
          : "not-required",
      };
    } catch (err) {
      if (isNotFound(err)) return null;
      throw toBackendError(err, "head", key);
    }
  }

  async function* list(): AsyncIterable<ObjectEntry> {
    let token: string | undefined;
    do {
      let page: ListObjectsV2CommandOutput;
      try {
        page = await client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: prefix,
            ContinuationToken: token,
          }),
        );
      } catch (err) {
        throw toBackendError(err, "list");
      }
      for (const object of page.Contents ?? []) {
        if (object.Key === undefined) continue;
        const key = object.Key.slice(prefix.length);
        if (key.length === 0 || key.includes("/")) continue;
        yield { key, size: object.Size ?? 0 };
      }
      token = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (token !== undefined);
  }

  async function listAll(): Promise<ObjectEntry[]> {
    const entries: ObjectEntry[] = [];
    for await (const entry of list()) entries.push(entry);
    return entries;
  }

  function resolveRestoreRequest(retrievalOptions: BackendOptions) {
    const tierOption = retrievalOptions["tier"];
    const tier = RetrievalTier.safeParse(tierOption ?? defaultTier);
    if (!tier.success) {
      throw new FatalBackendError(`Invalid retrieval tier: ${tierOption}`, {
        backend: "object-store",
        option: "tier",
        allowed: RetrievalTier.options,
      });
    }
    const daysOption = retrievalOptions["days"];
    const days = daysOption === undefined ? restoreDays : Number(daysOption);
    if (!Number.isInteger(days) || days < 1) {
      throw new FatalBackendError(`Invalid restore days: ${daysOption}`, {
        backend: "object-store",
        option: "days",
      });
    }
    return { Days: days, GlacierJobParameters: { Tier: tier.data } };
  }

  const backend: Backend = {
    kind: "object-store",
    tier: archive ? "archive" : "standard",
    synchronous: !archive,

    async init() {
      try {
        await client.send(
          new ListObjectsV2Command({ Bucket: bucket, Prefix: prefix, MaxKeys: 1 }),
        );
      } catch (err) {
        throw toBackendError(err, "init");
      }
    },

    async put(key, data, role) {
      const Key = objectKey(key);
      try {
        await client.send(
          new PutObjectCommand({
            Bucket: bucket,
            Key,
            Body: data,
            ContentType: "application/octet-stream",
            StorageClass: role === "data" ? storageClass : "STANDARD",
          }),
        );
      } catch (err) {
        throw toBackendError(err, "put", key);
      }
    },

    head,

    async delete(key) {
      // DeleteObject succeeds on missing keys, so check first.
      if ((await head(key)) === null) return false;
      try {
        await client.send(
          new DeleteObjectCommand({ Bucket: bucket, Key: objectKey(key) }),
        );
        return true;
      } catch (err) {
        if (isNotFound(err)) return false;
        throw toBackendError(err, "delete", key);
      }
    },

    async startInventory() {
      return archive
        ? `${INVENTORY_HANDLE}:${new Date().toISOString()}`
        : INVENTORY_HANDLE;
    },

    async pollInventory() {
      return { status: "ready", entries: await listAll() };
    },

    async startRetrieval(key, retrievalOptions) {
      const Key = objectKey(key);
      if (!archive) return key;

      const restoreRequest = resolveRestoreRequest(retrievalOptions);
      const current = await head(key);
      if (current === null) {
        throw new NotFoundError(`Object not found: ${key}`, {
          backend: "object-store",
          key,
        });
      }
      if (current.restore !== "required") return key;

      try {
        await client.send(
          new RestoreObjectCommand({
            Bucket: bucket,
            Key,
            RestoreRequest: restoreRequest,
          }),
        );
      } catch (err) {
        if (
          err instanceof S3ServiceException &&
          err.name === "RestoreAlreadyInProgress"
        ) {
          return key;
        }
        throw toBackendError(err, "restore", key);
      }
      return key;
    },

    async pollRetrieval(handle) {
      const current = await head(handle);
      if (current === null) {
        return { status: "failed", reason: `Object not found: ${handle}` };
      }
      switch (current.restore) {
        case "in-progress":
          return { status: "in-progress" };
        case "required":
          return {
            status: "failed",
            reason: `No active restore for ${handle} (expired or never requested)`,
          };
        default:
          return { status: "ready" };
      }
    },

    async fetch(key) {
      const Key = objectKey(key);
      try {
        const res = await client.send(
          new GetObjectCommand({ Bucket: bucket, Key }),
        );
        if (!res.Body) {
          throw new FatalBackendError(`Empty response body for ${key}`, {
            backend: "object-store",
            key,
          });
        }
        return await res.Body.transformToByteArray();
      } catch (err) {
        if (isNotFound(err)) {
          throw new NotFoundError(`Object not found: ${key}`, {
            backend: "object-store",
            key,
          });
        }
        throw toBackendError(err, "fetch", key);
      }
    },
  };

  // Archive buckets are only listed through an inventory job.
  return archive ? backend : { ...backend, list };
}

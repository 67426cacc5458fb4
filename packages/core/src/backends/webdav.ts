/**
 * WebDAV backend.
 * Uses PUT/GET/DELETE/HEAD on {url}/{key} and PROPFIND (Depth: 1) on the
 * collection for listings. Auth: HTTP Basic on every request.
 */

import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import {
  FatalBackendError,
  NotFoundError,
  TransientBackendError,
} from "../errors/catalog.js";
import {
  collectEntries,
  type Backend,
  type ObjectEntry,
  type ObjectHead,
} from "./interface.js";

export interface WebDavBackendOptions {
  url: string;
  username: string;
  password: string;
}

const INVENTORY_HANDLE = "inventory";

const PROPFIND_BODY = `<?xml version="1.0" encoding="utf-8"?>
<d:propfind xmlns:d="DAV:">
  <d:prop><d:resourcetype/><d:getcontentlength/></d:prop>
</d:propfind>`;

const MultiStatusSchema = z.object({
  multistatus: z.object({
    response: z
      .array(
        z.object({
          href: z.string(),
          propstat: z
            .array(
              z.object({
                status: z.string().optional(),
                prop: z
                  .object({
                    getcontentlength: z.coerce.number().optional(),
                    resourcetype: z.unknown().optional(),
                  })
                  .default({}),
              }),
            )
            .default([]),
        }),
      )
      .default([]),
  }),
});

type DavResponse = z.infer<
  typeof MultiStatusSchema
>["multistatus"]["response"][number];

const parser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  isArray: (name) => name === "response" || name === "propstat",
});

function isCollection(response: DavResponse): boolean {
  return response.propstat.some(
    ({ prop }) =>
      typeof prop.resourcetype === "object" &&
      prop.resourcetype !== null &&
      "collection" in prop.resourcetype,
  );
}

function contentLength(response: DavResponse): number {
  const ok = response.propstat.find(
    (p) => p.status === undefined || p.status.includes(" 200 "),
  );
  return ok?.prop.getcontentlength ?? 0;
}

/** Returns undefined for an href that is not valid percent-encoding. */
function decodeKey(encoded: string): string | undefined {
  try {
    return decodeURIComponent(encoded);
  } catch (err) {
    if (err instanceof URIError) return undefined;
    throw err;
  }
}

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

export function createWebDavBackend(options: WebDavBackendOptions): Backend {
  const base = options.url.endsWith("/") ? options.url : `${options.url}/`;
  const basePath = new URL(base).pathname;
  const authorization = `Basic ${Buffer.from(
    `${options.username}:${options.password}`,
  ).toString("base64")}`;

  function objectUrl(key: string): string {
    if (key.length === 0 || key.includes("/")) {
      throw new FatalBackendError(`Invalid object key: ${JSON.stringify(key)}`, {
        backend: "webdav",
        key,
      });
    }
    return base + encodeURIComponent(key);
  }

  function statusError(
    res: Response,
    operation: string,
    key?: string,
  ): TransientBackendError | FatalBackendError {
    const message = `WebDAV ${operation} failed${key ? ` for ${key}` : ""}: ${res.status} ${res.statusText}`;
    const details = {
      backend: "webdav",
      operation,
      status: res.status,
      ...(key !== undefined && { key }),
    };
    return isTransientStatus(res.status)
      ? new TransientBackendError(message, details)
      : new FatalBackendError(message, details);
  }

  async function request(
    url: string,
    init: RequestInit,
    operation: string,
    key?: string,
  ): Promise<Response> {
    try {
      return await fetch(url, {
        ...init,
        headers: { Authorization: authorization, ...init.headers },
      });
    } catch (err) {
      // fetch rejects only on network failures
      throw new TransientBackendError(
        `WebDAV ${operation} failed${key ? ` for ${key}` : ""}: ${
          err instanceof Error ? err.message : String(err)
        }`,
        { backend: "webdav", operation, ...(key !== undefined && { key }) },
        err,
      );
    }
  }

  async function propfind(depth: "0" | "1"): Promise<DavResponse[]> {
    const res = await request(
      base,
      {
        method: "PROPFIND",
        headers: { Depth: depth, "Content-Type": "application/xml" },
        body: PROPFIND_BODY,
      },
      "propfind",
    );
    if (res.status !== 207) {
      throw statusError(res, "propfind");
    }
    const parsed = MultiStatusSchema.safeParse(parser.parse(await res.text()));
    if (!parsed.success) {
      throw new FatalBackendError("WebDAV propfind returned an unexpected body", {
        backend: "webdav",
        issues: parsed.error.issues.map((i) => i.message),
      });
    }
    return parsed.data.multistatus.response;
  }

  async function head(key: string): Promise<ObjectHead | null> {
    const res = await request(objectUrl(key), { method: "HEAD" }, "head", key);
    if (res.status === 404) return null;
    if (!res.ok) throw statusError(res, "head", key);
    return {
      size: Number(res.headers.get("content-length") ?? 0),
      storageClass: null,
      restore: "not-required",
    };
  }

  async function* list(): AsyncIterable<ObjectEntry> {
    const responses = await propfind("1");
    for (const response of responses) {
      if (isCollection(response)) continue;
      const path = new URL(response.href, base).pathname;
      if (!path.startsWith(basePath)) continue;
      const key = decodeKey(path.slice(basePath.length));
      if (!key || key.includes("/")) continue;
      yield { key, size: contentLength(response) };
    }
  }

  return {
    kind: "webdav",
    tier: "standard",
    synchronous: true,

    async init() {
      await propfind("0");
    },

    async put(key, data) {
      const res = await request(
        objectUrl(key),
        {
          method: "PUT",
          body: Buffer.from(data),
          headers: { "Content-Type": "application/octet-stream" },
        },
        "put",
        key,
      );
      if (!res.ok) throw statusError(res, "put", key);
    },

    head,

    async delete(key) {
      const res = await request(objectUrl(key), { method: "DELETE" }, "delete", key);
      if (res.status === 404) return false;
      if (!res.ok) throw statusError(res, "delete", key);
      return true;
    },

    list,

    async startInventory() {
      return INVENTORY_HANDLE;
    },

    async pollInventory() {
      return { status: "ready", entries: await collectEntries(list()) };
    },

    async startRetrieval(key) {
      objectUrl(key);
      return key;
    },

    async pollRetrieval(handle) {
      return (await head(handle))
        ? { status: "ready" }
        : { status: "failed", reason: `Object not found: ${handle}` };
    },

    async fetch(key) {
      const res = await request(objectUrl(key), { method: "GET" }, "fetch", key);
      if (res.status === 404) {
        throw new NotFoundError(`Object not found: ${key}`, {
          backend: "webdav",
          key,
        });
      }
      if (!res.ok) throw statusError(res, "fetch", key);
      return new Uint8Array(await res.arrayBuffer());
    },
  };
}

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createWebDavBackend } from "./webdav.js";
import { collectEntries } from "./interface.js";
import {
  FatalBackendError,
  NotFoundError,
  TransientBackendError,
} from "../errors/catalog.js";

const URL_BASE = "https://dav.example.test/dav/box";
const AUTH = `Basic ${Buffer.from("user:test-secret").toString("base64")}`;

const MULTISTATUS = `<?xml version="1.0" encoding="utf-8"?>
<d:multistatus xmlns:d="DAV:">
  <d:response>
    <d:href>/dav/box/</d:href>
    <d:propstat>
      <d:prop><d:resourcetype><d:collection/></d:resourcetype></d:prop>
      <d:status>HTTP/1.1 200 OK</d:status>
    </d:propstat>
  </d:response>
  <d:response>
    <d:href>/dav/box/abc.data</d:href>
    <d:propstat>
      <d:prop><d:resourcetype/><d:getcontentlength>42</d:getcontentlength></d:prop>
      <d:status>HTTP/1.1 200 OK</d:status>
    </d:propstat>
  </d:response>
  <d:response>
    <d:href>https://dav.example.test/dav/box/with%20space.meta</d:href>
    <d:propstat>
      <d:prop><d:resourcetype/><d:getcontentlength>7</d:getcontentlength></d:prop>
      <d:status>HTTP/1.1 200 OK</d:status>
    </d:propstat>
  </d:response>
  <d:response>
    <d:href>/dav/box/nested/</d:href>
    <d:propstat>
      <d:prop><d:resourcetype><d:collection/></d:resourcetype></d:prop>
      <d:status>HTTP/1.1 200 OK</d:status>
    </d:propstat>
  </d:response>
</d:multistatus>`;

describe("WebDavBackend", () => {
  const originalFetch = globalThis.fetch;
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    globalThis.fetch = fetchMock;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  function backend() {
    return createWebDavBackend({
      url: URL_BASE,
      username: "user",
      password: "test-secret",
    });
  }

  function respond(
    status: number,
    body?: string | Uint8Array | null,
    headers?: Record<string, string>,
  ) {
    fetchMock.mockResolvedValueOnce(
      new Response(body ?? null, { status, headers }),
    );
  }

  function lastInit(): RequestInit {
    const call = fetchMock.mock.calls.at(-1);
    return call?.[1] ?? {};
  }

  describe("put", () => {
    it("sends PUT with Basic auth and an octet-stream body", async () => {
      respond(201);
      await backend().put("abc.data", new Uint8Array([1, 2, 3]), "data");

      expect(fetchMock.mock.calls[0]?.[0]).toBe(`${URL_BASE}/abc.data`);
      const init = lastInit();
      expect(init.method).toBe("PUT");
      expect(init.headers).toEqual({
        Authorization: AUTH,
        "Content-Type": "application/octet-stream",
      });
      expect(init.body).toEqual(Buffer.from([1, 2, 3]));
    });

    it("maps 503 to TransientBackendError", async () => {
      respond(503);
      await expect(
        backend().put("abc.data", new Uint8Array([1]), "data"),
      ).rejects.toBeInstanceOf(TransientBackendError);
    });

    it("maps 401 to FatalBackendError", async () => {
      respond(401);
      await expect(
        backend().put("abc.data", new Uint8Array([1]), "data"),
      ).rejects.toBeInstanceOf(FatalBackendError);
    });

    it("maps network failures to TransientBackendError", async () => {
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
      await expect(
        backend().put("abc.data", new Uint8Array([1]), "data"),
      ).rejects.toThrow("WebDAV put failed for abc.data: fetch failed");
    });
  });

  describe("head", () => {
    it("returns size from content-length", async () => {
      respond(200, null, { "content-length": "12" });
      expect(await backend().head("abc.data")).toEqual({
        size: 12,
        storageClass: null,
        restore: "not-required",
      });
      expect(lastInit().method).toBe("HEAD");
    });

    it("returns null on 404", async () => {
      respond(404);
      expect(await backend().head("abc.data")).toBeNull();
    });
  });

  describe("delete", () => {
    it("returns true on 204", async () => {
      respond(204);
      expect(await backend().delete("abc.data")).toBe(true);
      expect(lastInit().method).toBe("DELETE");
    });

    it("returns false on 404", async () => {
      respond(404);
      expect(await backend().delete("abc.data")).toBe(false);
    });
  });

  describe("fetch", () => {
    it("returns the body bytes", async () => {
      respond(200, new Uint8Array([7, 8]));
      expect(await backend().fetch("abc.data")).toEqual(new Uint8Array([7, 8]));
      expect(lastInit().method).toBe("GET");
    });

    it("throws NotFoundError on 404", async () => {
      respond(404);
      await expect(backend().fetch("abc.data")).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });
  });

  describe("list", () => {
    it("parses PROPFIND responses, skipping collections", async () => {
      respond(207, MULTISTATUS);
      const list = backend().list;
      if (!list) throw new Error("list missing");

      expect(await collectEntries(list())).toEqual([
        { key: "abc.data", size: 42 },
        { key: "with space.meta", size: 7 },
      ]);
      const init = lastInit();
      expect(init.method).toBe("PROPFIND");
      expect(init.headers).toEqual({
        Authorization: AUTH,
        Depth: "1",
        "Content-Type": "application/xml",
      });
      expect(fetchMock.mock.calls[0]?.[0]).toBe(`${URL_BASE}/`);
    });

    it("skips an entry whose href is not valid percent-encoding", async () => {
      respond(
        207,
        `<?xml version="1.0" encoding="utf-8"?>
<d:multistatus xmlns:d="DAV:">
  <d:response>
    <d:href>/dav/box/bad%E0%A4%A.data</d:href>
    <d:propstat>
      <d:prop><d:resourcetype/><d:getcontentlength>3</d:getcontentlength></d:prop>
      <d:status>HTTP/1.1 200 OK</d:status>
    </d:propstat>
  </d:response>
  <d:response>
    <d:href>/dav/box/abc.data</d:href>
    <d:propstat>
      <d:prop><d:resourcetype/><d:getcontentlength>42</d:getcontentlength></d:prop>
      <d:status>HTTP/1.1 200 OK</d:status>
    </d:propstat>
  </d:response>
</d:multistatus>`,
      );
      const list = backend().list;
      if (!list) throw new Error("list missing");

      expect(await collectEntries(list())).toEqual([{ key: "abc.data", size: 42 }]);
    });

    it("rejects a non-multistatus answer", async () => {
      respond(200, "<html/>");
      const list = backend().list;
      if (!list) throw new Error("list missing");
      await expect(collectEntries(list())).rejects.toBeInstanceOf(
        FatalBackendError,
      );
    });
  });

  it("init runs a Depth 0 PROPFIND", async () => {
    respond(207, MULTISTATUS);
    await backend().init();
    expect(lastInit().headers).toMatchObject({ Depth: "0" });
  });

  it("inventory is answered on the first poll", async () => {
    respond(207, MULTISTATUS);
    const b = backend();
    const handle = await b.startInventory({});
    const poll = await b.pollInventory(handle);
    expect(poll.status).toBe("ready");
    expect(poll.status === "ready" && poll.entries).toHaveLength(2);
  });

  it("retrieval is ready when the object exists", async () => {
    respond(200, null, { "content-length": "1" });
    const b = backend();
    const handle = await b.startRetrieval("abc.data", {});
    expect(fetchMock).not.toHaveBeenCalled();
    expect(await b.pollRetrieval(handle)).toEqual({ status: "ready" });
  });

  it("rejects keys containing a slash", async () => {
    await expect(backend().head("a/b")).rejects.toBeInstanceOf(
      FatalBackendError,
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

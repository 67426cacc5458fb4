import { describe, it, expect } from "vitest";
import {
  BackendConfigSchema,
  BoxConfigSchema,
  isArchiveStorageClass,
} from "./box-config.js";

describe("BackendConfigSchema", () => {
  it("parses a local backend", () => {
    const config = BackendConfigSchema.parse({
      kind: "local",
      folderPath: "/srv/archive",
    });
    expect(config).toEqual({ kind: "local", folderPath: "/srv/archive" });
  });

  it("fills object-store defaults", () => {
    const config = BackendConfigSchema.parse({
      kind: "object-store",
      bucket: "my-archive",
    });
    expect(config).toEqual({
      kind: "object-store",
      bucket: "my-archive",
      prefix: "",
      storageClass: "DEEP_ARCHIVE",
      tier: "Bulk",
      restoreDays: 1,
    });
  });

  it("rejects an unknown retrieval tier", () => {
    expect(() =>
      BackendConfigSchema.parse({
        kind: "object-store",
        bucket: "my-archive",
        tier: "Instant",
      }),
    ).toThrow();
  });

  it("requires credentials for webdav", () => {
    expect(() =>
      BackendConfigSchema.parse({
        kind: "webdav",
        url: "https://dav.example.com/box/",
        username: "alice",
      }),
    ).toThrow();
  });

  it("rejects an unknown kind", () => {
    expect(() =>
      BackendConfigSchema.parse({ kind: "ftp", host: "example.com" }),
    ).toThrow();
  });
});

describe("BoxConfigSchema", () => {
  const valid = {
    version: 1,
    name: "mybox",
    backend: { kind: "local", folderPath: "/srv/archive" },
    key: { id: "0123456789abcdef", file: "secret.key" },
    createdAt: "2026-01-21T10:00:00.000Z",
  };

  it("parses a valid box", () => {
    expect(BoxConfigSchema.parse(valid).name).toBe("mybox");
  });

  it.each(["", ".hidden", "a/b", "with space"])(
    "rejects box name %j",
    (name) => {
      expect(() => BoxConfigSchema.parse({ ...valid, name })).toThrow();
    },
  );
});

describe("isArchiveStorageClass", () => {
  it.each([
    ["GLACIER", true],
    ["DEEP_ARCHIVE", true],
    ["GLACIER_IR", false],
    ["STANDARD", false],
  ])("%s -> %s", (storageClass, expected) => {
    expect(isArchiveStorageClass(storageClass)).toBe(expected);
  });
});

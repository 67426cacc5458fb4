import { afterEach, describe, expect, it, vi } from "vitest";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { DEFAULT_ROOT_PATH } from "./defaults.js";
import { boxesDir, expandHomePath, resolveRootPath } from "./paths.js";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("expandHomePath", () => {
  it('expands "~" to the current home directory', () => {
    expect(expandHomePath("~")).toBe(homedir());
  });

  it('expands "~/" prefixes to the current home directory', () => {
    expect(expandHomePath("~/archives/coldbox")).toBe(
      resolve(homedir(), "archives/coldbox"),
    );
  });

  it("leaves non-home paths unchanged", () => {
    expect(expandHomePath("/tmp/sandbox")).toBe("/tmp/sandbox");
  });
});

describe("resolveRootPath", () => {
  it("returns default root path when no input or env is set", () => {
    vi.stubEnv("COLDBOX_ROOT", "");
    expect(resolveRootPath()).toBe(resolve(DEFAULT_ROOT_PATH));
  });

  it("uses COLDBOX_ROOT when no input is provided", () => {
    vi.stubEnv("COLDBOX_ROOT", "/tmp/from-env");
    expect(resolveRootPath()).toBe("/tmp/from-env");
  });

  it("prefers explicit input over COLDBOX_ROOT", () => {
    vi.stubEnv("COLDBOX_ROOT", "/tmp/from-env");
    expect(resolveRootPath("/tmp/explicit")).toBe("/tmp/explicit");
  });

  it("resolves relative paths to absolute", () => {
    expect(resolveRootPath("relative/coldbox")).toBe(
      resolve("relative/coldbox"),
    );
  });
});

describe("boxesDir", () => {
  it("is the boxes directory under the root", () => {
    expect(boxesDir("/tmp/root")).toBe(join("/tmp/root", "boxes"));
  });
});

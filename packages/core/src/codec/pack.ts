/**
 * tar framing of a file or directory tree, gzip-compressed by default.
 * Archives hold a single top-level entry named after the packed path, so
 * unpacking into a destination recreates `<destination>/<basename>`.
 */

import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, dirname, join, resolve } from "node:path";
import { create, extract } from "tar";
import { NotFoundError } from "../errors/catalog.js";

async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), "coldbox-pack-"));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export type Compression = "gz" | "none";

export interface PackOptions {
  /** Default: "gz". */
  compression?: Compression;
  /** Store file and directory modes. Otherwise 0644 and 0755 are stored. */
  mode?: boolean;
  /** Store modification times. */
  mtime?: boolean;
}

export interface UnpackOptions {
  /** Apply the stored modes. Otherwise the process umask decides. */
  mode?: boolean;
  /** Apply the stored modification times. */
  mtime?: boolean;
}

const FILE_MODE = 0o644;
const DIR_MODE = 0o755;

export async function packPath(
  path: string,
  options: PackOptions = {},
): Promise<Uint8Array> {
  const absolute = resolve(path);
  try {
    await stat(absolute);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new NotFoundError(`Path not found: ${path}`, { path });
    }
    throw err;
  }

  return withTempDir(async (dir) => {
    const archive = join(dir, "pack.tar");
    await create(
      {
        gzip: (options.compression ?? "gz") === "gz",
        portable: true,
        noMtime: !options.mtime,
        onWriteEntry: options.mode
          ? undefined
          : (entry) => {
              const entryStat = entry.stat;
              if (!entryStat) return;
              const mode = entry.type === "Directory" ? DIR_MODE : FILE_MODE;
              // keep the file type bits
              entryStat.mode = (entryStat.mode & ~0o7777) | mode;
            },
        file: archive,
        cwd: dirname(absolute),
      },
      [basename(absolute)],
    );
    return new Uint8Array(await readFile(archive));
  });
}

/**
 * Extracts a packed archive into `destination`, creating it if needed.
 * Compressed and uncompressed archives are both accepted.
 */
export async function unpackTo(
  archive: Uint8Array,
  destination: string,
  options: UnpackOptions = {},
): Promise<void> {
  await mkdir(destination, { recursive: true });
  await withTempDir(async (dir) => {
    const file = join(dir, "unpack.tar");
    await writeFile(file, archive);
    await extract({
      file,
      cwd: destination,
      strict: true,
      noMtime: !options.mtime,
      onReadEntry: options.mode
        ? undefined
        : (entry) => {
            entry.mode = undefined;
          },
    });
  });
}

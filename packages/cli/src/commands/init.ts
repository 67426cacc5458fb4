/**
 * init command - Create a box on one of the supported backends.
 */

import { resolve } from "node:path";
import chalk from "chalk";
import type { Command } from "commander";

import type { BackendConfigInput, BoxConfig } from "@coldbox/core/schemas";
import { ObjectStoreStorageClass, RetrievalTier } from "@coldbox/core/schemas";

import { loadCliContext, parsePositiveInt } from "../helpers.js";

export const WEBDAV_PASSWORD_ENV = "COLDBOX_WEBDAV_PASSWORD";

interface WebDavInitOptions {
  username: string;
  password?: string;
}

interface S3InitOptions {
  prefix?: string;
  region?: string;
  profile?: string;
  endpoint?: string;
  storageClass?: string;
  tier?: string;
  restoreDays?: number;
}

export function registerInitCommand(program: Command): void {
  const init = program
    .command("init")
    .description("Create a box and its encryption key");

  async function create(box: string, backend: BackendConfigInput): Promise<void> {
    const cli = await loadCliContext(program);
    const created: BoxConfig = await cli.registry.createBox(box, backend);
    console.log(chalk.green(`Created box ${created.name}`));
    console.log(`  Key: ${created.key.id}`);
    console.log(`  Path: ${cli.registry.paths(created.name).dir}`);
  }

  init
    .command("local <box> <folder>")
    .description("Store objects in a local folder")
    .action(async (box: string, folder: string) => {
      await create(box, { kind: "local", folderPath: resolve(folder) });
    });

  init
    .command("webdav <box> <url>")
    .description("Store objects on a WebDAV collection")
    .requiredOption("-u, --username <name>", "WebDAV user")
    .option("-p, --password <password>", `WebDAV password (default: $${WEBDAV_PASSWORD_ENV})`)
    .action(async (box: string, url: string, options: WebDavInitOptions) => {
      const password = options.password ?? process.env[WEBDAV_PASSWORD_ENV];
      if (!password) {
        throw new Error(
          `A WebDAV password is required: pass --password or set ${WEBDAV_PASSWORD_ENV}`,
        );
      }
      await create(box, {
        kind: "webdav",
        url,
        username: options.username,
        password,
      });
    });

  init
    .command("s3 <box> <bucket>")
    .description("Store objects in an S3 bucket, archive tier by default")
    .option("--prefix <prefix>", "Key prefix inside the bucket")
    .option("--region <region>", "Bucket region")
    .option("--profile <profile>", "Shared credentials profile")
    .option("--endpoint <url>", "S3-compatible endpoint")
    .option(
      "--storage-class <class>",
      `Storage class for data objects (${ObjectStoreStorageClass.options.join(", ")})`,
    )
    .option("--tier <tier>", `Default restore tier (${RetrievalTier.options.join(", ")})`)
    .option("--restore-days <days>", "Days a restored copy stays available", parsePositiveInt)
    .action(async (box: string, bucket: string, options: S3InitOptions) => {
      await create(box, {
        kind: "object-store",
        bucket,
        prefix: options.prefix,
        region: options.region,
        profile: options.profile,
        endpoint: options.endpoint,
        storageClass: ObjectStoreStorageClass.optional().parse(options.storageClass),
        tier: RetrievalTier.optional().parse(options.tier),
        restoreDays: options.restoreDays,
      });
    });
}

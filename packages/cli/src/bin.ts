#!/usr/bin/env -S node --import tsx
import { createProgram, formatError } from "./index.js";

const controller = new AbortController();
process.once("SIGINT", () => controller.abort());

createProgram({ signal: controller.signal })
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(formatError(error));
    process.exitCode = 1;
  });
